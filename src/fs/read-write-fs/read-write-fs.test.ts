import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  AlreadyExistsError,
  NotASymlinkError,
  NotFoundError,
} from "../errors.js";
import { S_IFDIR, S_IFLNK, S_IFMT, S_IFREG } from "../interface.js";
import { ReadWriteFs } from "./read-write-fs.js";

describe("ReadWriteFs", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "read-write-fs-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("constructor", () => {
    it("should throw for non-existent root", () => {
      expect(() => {
        new ReadWriteFs({ root: "/nonexistent/path/12345" });
      }).toThrow("does not exist");
    });

    it("should throw for file as root", () => {
      const filePath = path.join(tempDir, "file.txt");
      fs.writeFileSync(filePath, "content");
      expect(() => {
        new ReadWriteFs({ root: filePath });
      }).toThrow("not a directory");
    });
  });

  describe("reading and writing", () => {
    it("should read files as buffer", async () => {
      const data = Buffer.from([0x00, 0xff, 0x10, 0x0d, 0x0a]);
      fs.writeFileSync(path.join(tempDir, "binary.bin"), data);
      const rwfs = new ReadWriteFs({ root: tempDir });

      const buffer = await rwfs.readFileBuffer("/binary.bin");
      expect(buffer).toEqual(new Uint8Array(data));
    });

    it("should write files creating parent directories", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      await rwfs.writeFile("/a/b/note.txt", "hello");

      const written = path.join(tempDir, "a", "b", "note.txt");
      expect(fs.readFileSync(written, "utf8")).toBe("hello");
    });

    it("should throw NotFoundError with the virtual path only", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      const error = await rwfs
        .readFileBuffer("/missing.txt")
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty(
        "message",
        "ENOENT: no such file or directory, open '/missing.txt'",
      );
    });

    it("should refuse reads over maxFileReadSize", async () => {
      fs.writeFileSync(path.join(tempDir, "big.bin"), Buffer.alloc(16));
      const rwfs = new ReadWriteFs({ root: tempDir, maxFileReadSize: 8 });

      await expect(rwfs.readFileBuffer("/big.bin")).rejects.toThrow("EFBIG");
    });
  });

  describe("stat", () => {
    it("should report type bits and link counts", async () => {
      fs.mkdirSync(path.join(tempDir, "dir"));
      fs.writeFileSync(path.join(tempDir, "file.txt"), "12345");
      const rwfs = new ReadWriteFs({ root: tempDir });

      const fileStat = await rwfs.stat("/file.txt");
      expect(fileStat.mode & S_IFMT).toBe(S_IFREG);
      expect(fileStat.size).toBe(5);
      expect(fileStat.nlink).toBe(1);

      const dirStat = await rwfs.stat("/dir");
      expect(dirStat.mode & S_IFMT).toBe(S_IFDIR);
      expect(dirStat.isDirectory).toBe(true);
    });

    it("should lstat the root itself", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      const stat = await rwfs.lstat("/");
      expect(stat.isDirectory).toBe(true);
    });
  });

  describe("mkdir", () => {
    it("should fail with AlreadyExistsError when it exists", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      await rwfs.mkdir("/jail");

      await expect(rwfs.mkdir("/jail")).rejects.toBeInstanceOf(
        AlreadyExistsError,
      );
    });

    it("should let exactly one of two concurrent creates win", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      const results = await Promise.allSettled([
        rwfs.mkdir("/race"),
        rwfs.mkdir("/race"),
      ]);

      expect(results.filter((r) => r.status === "fulfilled")).toHaveLength(1);
      const rejected = results.filter((r) => r.status === "rejected");
      expect(rejected).toHaveLength(1);
    });
  });

  describe("rm", () => {
    it("should remove a directory tree recursively", async () => {
      fs.mkdirSync(path.join(tempDir, "ftp", "pub"), { recursive: true });
      fs.writeFileSync(path.join(tempDir, "ftp", "pub", "a.txt"), "a");
      const rwfs = new ReadWriteFs({ root: tempDir });

      await rwfs.rm("/ftp", { recursive: true, force: true });

      expect(fs.existsSync(path.join(tempDir, "ftp"))).toBe(false);
    });

    it("should remove a symlink but not its target", async () => {
      fs.writeFileSync(path.join(tempDir, "real.txt"), "x");
      fs.symlinkSync("real.txt", path.join(tempDir, "alias"));
      const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });

      await rwfs.rm("/alias");

      expect(fs.readdirSync(tempDir)).toEqual(["real.txt"]);
    });

    it("should report a missing path with its virtual path", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      await expect(rwfs.rm("/nope")).rejects.toThrow(
        "ENOENT: no such file or directory, rm '/nope'",
      );
    });

    it("should refuse to remove the root", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      await expect(rwfs.rm("/", { recursive: true })).rejects.toThrow(
        "EPERM: operation not permitted, rm '/'",
      );
      expect(fs.existsSync(tempDir)).toBe(true);
    });
  });

  describe("symlinks", () => {
    it("should reject symlink creation by default", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      await expect(rwfs.symlink("target", "/link")).rejects.toThrow("EPERM");
    });

    it("should store and read back targets verbatim", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });
      await rwfs.symlink("/etc/passwd", "/passwd");
      await rwfs.symlink("../up/there", "/relative");

      expect(await rwfs.readlink("/passwd")).toBe("/etc/passwd");
      expect(await rwfs.readlink("/relative")).toBe("../up/there");
      expect(fs.readlinkSync(path.join(tempDir, "passwd"))).toBe("/etc/passwd");
    });

    it("should lstat a link without following it", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });
      await rwfs.symlink("/etc/passwd", "/passwd");

      const stat = await rwfs.lstat("/passwd");
      expect(stat.isSymbolicLink).toBe(true);
      expect(stat.mode & S_IFMT).toBe(S_IFLNK);
    });

    it("should throw NotASymlinkError for readlink on a file", async () => {
      fs.writeFileSync(path.join(tempDir, "plain.txt"), "x");
      const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });

      await expect(rwfs.readlink("/plain.txt")).rejects.toBeInstanceOf(
        NotASymlinkError,
      );
    });

    it("should list symlinks without following them", async () => {
      fs.mkdirSync(path.join(tempDir, "real"));
      fs.symlinkSync("real", path.join(tempDir, "alias"));
      const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });

      expect(await rwfs.readdirWithFileTypes("/")).toEqual([
        { name: "alias", isFile: false, isDirectory: false, isSymbolicLink: true },
        { name: "real", isFile: false, isDirectory: true, isSymbolicLink: false },
      ]);
    });
  });

  describe("openExclusive", () => {
    it("should write chunks and return the byte counts", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      const handle = await rwfs.openExclusive("/upload.bin");

      expect(await handle.write(new Uint8Array([1, 2, 3]))).toBe(3);
      expect(await handle.write(new Uint8Array([4]))).toBe(1);
      await handle.flush();
      await handle.close();

      expect(
        new Uint8Array(fs.readFileSync(path.join(tempDir, "upload.bin"))),
      ).toEqual(new Uint8Array([1, 2, 3, 4]));
    });

    it("should refuse to overwrite an existing file", async () => {
      fs.writeFileSync(path.join(tempDir, "taken.bin"), "original");
      const rwfs = new ReadWriteFs({ root: tempDir });

      await expect(rwfs.openExclusive("/taken.bin")).rejects.toBeInstanceOf(
        AlreadyExistsError,
      );
      expect(fs.readFileSync(path.join(tempDir, "taken.bin"), "utf8")).toBe(
        "original",
      );
    });

    it("should fail writes after close with EBADF", async () => {
      const rwfs = new ReadWriteFs({ root: tempDir });
      const handle = await rwfs.openExclusive("/closed.bin");
      await handle.close();

      await expect(handle.write(new Uint8Array([1]))).rejects.toThrow("EBADF");
    });
  });
});

describe("ReadWriteFs Security - Path Traversal Prevention", () => {
  let tempDir: string;
  let outsideDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "rwfs-sandbox-"));
    outsideDir = fs.mkdtempSync(path.join(os.tmpdir(), "rwfs-outside-"));
    fs.writeFileSync(path.join(outsideDir, "secret.txt"), "outside");
    fs.writeFileSync(path.join(tempDir, "allowed.txt"), "This is allowed");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
    fs.rmSync(outsideDir, { recursive: true, force: true });
  });

  it("should clamp ../ at the root", async () => {
    const rwfs = new ReadWriteFs({ root: tempDir });
    const allowed = await rwfs.readFileBuffer("/../allowed.txt");
    expect(new TextDecoder().decode(allowed)).toBe("This is allowed");
  });

  it("should not read outside files through a host symlink", async () => {
    fs.symlinkSync(
      path.join(outsideDir, "secret.txt"),
      path.join(tempDir, "escape"),
    );
    const strict = new ReadWriteFs({ root: tempDir });
    const lenient = new ReadWriteFs({ root: tempDir, allowSymlinks: true });

    await expect(strict.readFileBuffer("/escape")).rejects.toThrow("EACCES");
    await expect(lenient.readFileBuffer("/escape")).rejects.toThrow("EACCES");
  });

  it("should not create files through a link leading out", async () => {
    fs.symlinkSync(outsideDir, path.join(tempDir, "out"));
    const rwfs = new ReadWriteFs({ root: tempDir, allowSymlinks: true });

    await expect(rwfs.openExclusive("/out/dropped.bin")).rejects.toThrow(
      "EACCES",
    );
    expect(fs.existsSync(path.join(outsideDir, "dropped.bin"))).toBe(false);
  });

  it("should reject null bytes", async () => {
    const rwfs = new ReadWriteFs({ root: tempDir });
    await expect(rwfs.readFileBuffer("/allowed.txt\0.png")).rejects.toThrow(
      "ENOENT",
    );
  });

  it("should not report outside paths as existing", async () => {
    const rwfs = new ReadWriteFs({ root: tempDir });
    expect(await rwfs.exists(path.join(outsideDir, "secret.txt"))).toBe(false);
  });
});
