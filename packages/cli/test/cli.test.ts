/**
 * Integration tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { createTempStoreRoot, removeDir, withTempDir } from "@flatpages/testkit/fs";
import { run } from "../src/program.js";

/**
 * Silence console output and record it
 */
function spyConsole() {
  return {
    log: vi.spyOn(console, "log").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

function spyStderr() {
  return vi.spyOn(process.stderr, "write").mockImplementation(() => true);
}

describe("CLI", () => {
  let tmpDir: string;
  let log: ReturnType<typeof spyConsole>["log"];
  let error: ReturnType<typeof spyConsole>["error"];
  let stderr: ReturnType<typeof spyStderr>;
  let originalRoot: string | undefined;

  /**
   * Run the CLI against the temp root
   */
  function cli(...args: string[]): Promise<number> {
    return run(["--root", tmpDir, ...args], "user");
  }

  function logged(): unknown[] {
    return log.mock.calls.map((call) => call[0]);
  }

  beforeEach(async () => {
    tmpDir = await createTempStoreRoot();
    ({ log, error } = spyConsole());
    stderr = spyStderr();
    originalRoot = process.env.FLATPAGES_ROOT;
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    if (originalRoot !== undefined) {
      process.env.FLATPAGES_ROOT = originalRoot;
    } else {
      delete process.env.FLATPAGES_ROOT;
    }
    await removeDir(tmpDir);
  });

  describe("put", () => {
    it("should store inline JSON with sorted fields", async () => {
      expect(await cli("put", "/my/url", "--data", '{"title":"Home","body":"a\\nb"}')).toBe(0);

      const content = await fs.readFile(path.join(tmpDir, "my^url.yaml"), "utf-8");
      expect(content).toBe("body: |-\n    a\n    b\ntitle: Home\n");
      expect(logged()).toEqual([`Stored /my/url at ${path.join(tmpDir, "my^url.yaml")}`]);
    });

    it("should keep field order with --ordered", async () => {
      expect(await cli("put", "page", "--ordered", "--data", '{"title":"Home","body":"Hi"}')).toBe(0);

      const content = await fs.readFile(path.join(tmpDir, "page.yaml"), "utf-8");
      expect(content).toBe("title: Home\nbody: Hi\n");
    });

    it("should read a document from a file", async () => {
      const file = path.join(tmpDir, "input.json");
      await fs.writeFile(file, '["home", "about"]');

      expect(await cli("put", "menu", "--file", file)).toBe(0);

      const content = await fs.readFile(path.join(tmpDir, "menu.yaml"), "utf-8");
      expect(content).toBe("- home\n- about\n");
    });

    it("should stay silent with --quiet", async () => {
      expect(await cli("--quiet", "put", "page", "--data", '{"a":1}')).toBe(0);

      expect(log).not.toHaveBeenCalled();
    });

    it("should reject both --file and --data", async () => {
      expect(await cli("put", "page", "--file", "x.json", "--data", "{}")).toBe(1);

      expect(error).toHaveBeenCalledWith(
        "Error: Cannot use both --file and --data; choose one or use stdin"
      );
    });

    it("should reject invalid JSON", async () => {
      expect(await cli("put", "page", "--data", "{oops")).toBe(1);

      expect(String(error.mock.calls[0]?.[0])).toMatch(/^Error: Invalid JSON in --data: /);
      expect(await cli("exists", "page")).toBe(2);
    });

    it("should reject a null document", async () => {
      expect(await cli("put", "page", "--data", "null")).toBe(1);

      expect(error).toHaveBeenCalledWith(
        "Error: Document must be a JSON object, array or scalar, not null"
      );
    });
  });

  describe("get", () => {
    it("should print the document as formatted JSON", async () => {
      await cli("put", "page", "--data", '{"b":1,"a":2}');
      log.mockClear();

      expect(await cli("get", "page")).toBe(0);

      expect(logged()).toEqual([JSON.stringify({ a: 2, b: 1 }, null, 2)]);
    });

    it("should print compact JSON with --raw", async () => {
      await cli("put", "page", "--data", '{"tags":["x","y"]}');
      log.mockClear();

      expect(await cli("get", "page", "--raw")).toBe(0);

      expect(logged()).toEqual(['{"tags":["x","y"]}']);
    });

    it("should exit 2 for a missing document", async () => {
      expect(await cli("get", "missing")).toBe(2);

      expect(error).toHaveBeenCalledWith("Error: Document not found: missing");
      expect(log).not.toHaveBeenCalled();
    });

    it("should apply built-in filters", async () => {
      await cli("put", "page", "--data", '{"title|upper":"hello","note|trim":"  x  ","plain":"y"}');
      log.mockClear();

      expect(await cli("get", "page", "--raw", "--filter", "upper", "--filter", "trim")).toBe(0);

      expect(logged()).toEqual(['{"note":"x","plain":"y","title":"HELLO"}']);
    });

    it("should keep tagged names without --filter", async () => {
      await cli("put", "page", "--data", '{"title|upper":"hello"}');
      log.mockClear();

      expect(await cli("get", "page", "--raw")).toBe(0);

      expect(logged()).toEqual(['{"title|upper":"hello"}']);
    });

    it("should reject unknown filters", async () => {
      expect(await cli("get", "page", "--filter", "markdown")).toBe(1);

      expect(error).not.toHaveBeenCalled();
      expect(stderr).toHaveBeenCalled();
    });

    it("should report malformed documents", async () => {
      const file = path.join(tmpDir, "broken.yaml");
      await fs.writeFile(file, "items: [1, 2\n");

      expect(await cli("get", "broken")).toBe(1);

      expect(error).toHaveBeenCalledWith(`Error: Failed to parse document: ${file}`);
    });
  });

  describe("exists", () => {
    it("should print true and exit 0 for a stored document", async () => {
      await cli("put", "page", "--data", '{"a":1}');
      log.mockClear();

      expect(await cli("exists", "page")).toBe(0);

      expect(logged()).toEqual(["true"]);
    });

    it("should print false and exit 2 for a missing document", async () => {
      expect(await cli("exists", "page")).toBe(2);

      expect(logged()).toEqual(["false"]);
      expect(error).not.toHaveBeenCalled();
    });
  });

  describe("path", () => {
    it("should print the single-folder path", async () => {
      expect(await cli("path", "a/b/c")).toBe(0);

      expect(logged()).toEqual([path.join(tmpDir, "a^b^c.yaml")]);
    });

    it("should honor --backend, --ext and --delimiter", async () => {
      expect(await cli("--backend", "multi-folder", "--ext", "yml", "path", "../a/b")).toBe(0);
      expect(await cli("--delimiter", "#", "path", "a/b")).toBe(0);

      expect(logged()).toEqual([
        path.join(tmpDir, "a", "b.yml"),
        path.join(tmpDir, "a#b.yaml"),
      ]);
    });

    it("should reject an unknown backend", async () => {
      expect(await cli("--backend", "nested", "path", "a")).toBe(1);

      expect(log).not.toHaveBeenCalled();
    });

    it("should reject a delimiter containing a separator", async () => {
      expect(await cli("--delimiter", "/", "path", "a")).toBe(1);

      expect(error).toHaveBeenCalledWith(
        'Error: Invalid option "pathDelimiter": cannot contain a path separator: "/"'
      );
    });
  });

  describe("environment", () => {
    it("should fall back to FLATPAGES_ROOT", async () => {
      await withTempDir(async (dir) => {
        process.env.FLATPAGES_ROOT = dir;

        expect(await run(["path", "page"], "user")).toBe(0);

        expect(logged()).toEqual([path.join(dir, "page.yaml")]);
      });
    });

    it("should take the layout from FLATPAGES_BACKEND and FLATPAGES_EXT", async () => {
      vi.stubEnv("FLATPAGES_BACKEND", "multi-folder");
      vi.stubEnv("FLATPAGES_EXT", "yml");

      expect(await cli("put", "docs/intro", "--data", '{"a":1}')).toBe(0);

      expect(await fs.readFile(path.join(tmpDir, "docs", "intro.yml"), "utf-8")).toBe("a: 1\n");
    });

    it("should report an unknown FLATPAGES_BACKEND", async () => {
      vi.stubEnv("FLATPAGES_BACKEND", "nested");

      expect(await cli("path", "page")).toBe(1);

      expect(error).toHaveBeenCalledWith(
        'Error: FLATPAGES_BACKEND must be one of: single-folder, multi-folder (got "nested")'
      );
    });

    it("should write command metrics with FLATPAGES_CLI_DEBUG=1", async () => {
      vi.stubEnv("FLATPAGES_CLI_DEBUG", "1");

      expect(await cli("--backend", "multi-folder", "get", "a/b")).toBe(2);

      const metrics = stderr.mock.calls
        .map((call) => String(call[0]))
        .filter((line) => line.startsWith("metric"));
      expect(metrics).toHaveLength(1);
      expect(metrics[0]).toMatch(
        /^metric cli\.get key="a\/b" backend=multi-folder outcome=absent duration_ms=\d+\n$/
      );
    });
  });

  describe("usage", () => {
    it("should exit 1 for an unknown command", async () => {
      expect(await cli("remove", "page")).toBe(1);
    });

    it("should exit 0 after printing the version", async () => {
      const write = vi.spyOn(process.stdout, "write").mockImplementation(() => true);

      expect(await run(["--version"], "user")).toBe(0);

      expect(write).toHaveBeenCalledWith("0.1.0\n");
    });
  });
});
