import * as path from "node:path";
import { describe, expect, it } from "vitest";
import { createErrorSanitizer } from "./sanitize-error.js";

describe("createErrorSanitizer", () => {
  const sanitize = createErrorSanitizer({
    source: "/srv/honeypot/template",
    data: "/srv/honeypot/data/",
    "jail-root": "/srv/honeypot/data/jails",
    unset: undefined,
  });

  it("should replace a configured root with its label", () => {
    expect(sanitize("root does not exist: /srv/honeypot/template")).toBe(
      "root does not exist: <source>",
    );
  });

  it("should replace paths below a root", () => {
    expect(
      sanitize("EACCES: permission denied, open '/srv/honeypot/data/up.bin'"),
    ).toBe("EACCES: permission denied, open '<data>/up.bin'");
  });

  it("should prefer the longer of two nested roots", () => {
    expect(sanitize("cannot lock /srv/honeypot/data/jails/ftp")).toBe(
      "cannot lock <jail-root>/ftp",
    );
  });

  it("should only match whole path segments", () => {
    const message =
      "open '/srv/honeypot/database' and '/srv/honeypot/data.old'";
    expect(sanitize(message)).toBe(message);
  });

  it("should resolve relative roots", () => {
    const relative = createErrorSanitizer({ data: "uploads" });
    const absolute = path.join(process.cwd(), "uploads", "x");
    expect(relative(`failed at ${absolute}`)).toBe("failed at <data>/x");
  });

  it("should strip stack traces", () => {
    const message =
      "TypeError: boom\n    at Object.foo (/srv/honeypot/template/app.js:10:5)\n    at next (node:internal/x:1:2)";
    expect(sanitize(message)).toBe("TypeError: boom");
  });

  it("should leave jail paths alone", () => {
    const message = "ENOTDIR: not a directory, chdir '/pub/readme.txt'";
    expect(sanitize(message)).toBe(message);
  });

  it("should ignore a root of /", () => {
    const everything = createErrorSanitizer({ source: "/" });
    expect(everything("ENOENT: no such file or directory, open '/x'")).toBe(
      "ENOENT: no such file or directory, open '/x'",
    );
  });
});
