import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AlreadyExistsError } from "../fs/errors.js";
import { InMemoryFs } from "../fs/in-memory-fs/in-memory-fs.js";
import type { IFileSystem } from "../fs/interface.js";
import type { JailLogger } from "../types.js";
import { JailRoot } from "./jail-root.js";

function source(): InMemoryFs {
  return new InMemoryFs({ "/pub/readme.txt": "hello" });
}

function failing<K extends keyof IFileSystem>(
  inner: IFileSystem,
  method: K,
  message: string,
): IFileSystem {
  return new Proxy(inner, {
    get(target, prop, receiver) {
      if (prop === method) {
        return async () => {
          throw new Error(message);
        };
      }
      return Reflect.get(target, prop, receiver);
    },
  });
}

describe("JailRoot", () => {
  it("should register created jails", async () => {
    const root = new JailRoot();
    const ftp = await root.addProtocol("ftp", source());
    await root.addProtocol("http", source());

    expect(root.get("ftp")).toBe(ftp);
    expect(root.get("s7")).toBeUndefined();
    expect(root.protocols()).toEqual(["ftp", "http"]);
    expect(await root.store.readdir("/")).toEqual(["ftp", "http"]);
  });

  it("should refuse a second jail for the same protocol", async () => {
    const root = new JailRoot();
    const first = await root.addProtocol("ftp", source());
    await first.chdir("pub");

    await expect(root.addProtocol("ftp", source())).rejects.toBeInstanceOf(
      AlreadyExistsError,
    );
    expect(root.get("ftp")).toBe(first);
    expect(first.cwd).toBe("/pub");
  });

  it("should let exactly one of two concurrent creates win", async () => {
    const root = new JailRoot();
    const results = await Promise.allSettled([
      root.addProtocol("ftp", source()),
      root.addProtocol("ftp", source()),
    ]);

    expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
    const reasons = results.flatMap((r) =>
      r.status === "rejected" ? [r.reason] : [],
    );
    expect(reasons).toHaveLength(1);
    expect(reasons[0]).toBeInstanceOf(AlreadyExistsError);
  });

  it.each(["", ".", "..", "ftp/../http", "ftp\0"])(
    "should reject %j as a protocol name",
    async (name) => {
      const root = new JailRoot();

      await expect(root.addProtocol(name, source())).rejects.toThrow("EINVAL");
      expect(await root.store.readdir("/")).toEqual([]);
    },
  );

  it("should log creation and mirror counts", async () => {
    const logger: JailLogger = { info: vi.fn(), debug: vi.fn() };
    const root = new JailRoot({ logger });

    await root.addProtocol("ftp", source());

    expect(logger.info).toHaveBeenCalledWith("jail created", {
      protocol: "ftp",
      home: "/ftp",
    });
    expect(logger.debug).toHaveBeenCalledWith("mirrored source tree", {
      protocol: "ftp",
      files: 1,
      directories: 1,
      symlinks: 0,
      bytes: 5,
    });
  });

  it("should use the given store", async () => {
    const store = new InMemoryFs();
    const root = new JailRoot({ store });

    await root.addProtocol("ftp", source());

    const copied = await store.readFileBuffer("/ftp/pub/readme.txt");
    expect(new TextDecoder().decode(copied)).toBe("hello");
  });

  it("should remove a partly mirrored jail so it can be created again", async () => {
    const store = new InMemoryFs();
    const root = new JailRoot({ store });

    await expect(
      root.addProtocol("ftp", failing(source(), "readFileBuffer", "disk gone")),
    ).rejects.toThrow("disk gone");
    expect(root.get("ftp")).toBeUndefined();
    expect(await store.exists("/ftp")).toBe(false);

    const jail = await root.addProtocol("ftp", source());
    expect(await jail.listdir("pub")).toEqual(["readme.txt"]);
  });

  it("should report both errors when cleanup fails too", async () => {
    const store = failing(new InMemoryFs(), "rm", "store gone");
    const root = new JailRoot({ store });

    const error = await root
      .addProtocol("ftp", failing(source(), "readFileBuffer", "disk gone"))
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AggregateError);
    expect(error).toHaveProperty(
      "message",
      "mirroring into /ftp failed and cleanup failed",
    );
    const messages =
      error instanceof AggregateError
        ? error.errors.map((e: unknown) =>
            e instanceof Error ? e.message : String(e),
          )
        : [];
    expect(messages).toEqual(["disk gone", "store gone"]);
  });

  describe("on disk", () => {
    let jailDir: string;
    let sourceDir: string;

    beforeEach(() => {
      jailDir = fs.mkdtempSync(path.join(os.tmpdir(), "jail-root-"));
      sourceDir = fs.mkdtempSync(path.join(os.tmpdir(), "jail-source-"));
      fs.writeFileSync(path.join(sourceDir, "big.bin"), Buffer.alloc(16));
    });

    afterEach(() => {
      fs.rmSync(jailDir, { recursive: true, force: true });
      fs.rmSync(sourceDir, { recursive: true, force: true });
    });

    it("should create jails under the directory", async () => {
      const root = new JailRoot({ directory: jailDir });
      await root.addProtocol("ftp", sourceDir);

      expect(fs.statSync(path.join(jailDir, "ftp", "big.bin")).size).toBe(16);
    });

    it("should refuse an existing jail directory left on disk", async () => {
      fs.mkdirSync(path.join(jailDir, "ftp"));
      const root = new JailRoot({ directory: jailDir });

      await expect(root.addProtocol("ftp", sourceDir)).rejects.toBeInstanceOf(
        AlreadyExistsError,
      );
    });

    it("should apply the mirror size limit", async () => {
      const root = new JailRoot({ maxMirrorFileSize: 8 });

      await expect(root.addProtocol("ftp", sourceDir)).rejects.toThrow(
        "EFBIG",
      );
      expect(await root.store.exists("/ftp")).toBe(false);
    });
  });
});
