import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { runCli, type CliContext } from "./cli.js";
import { createInMemoryCaseApi, type InMemoryCaseApi } from "./testing/inMemoryCaseApi.js";

const credentials = {
  TESTRAIL_URL: "https://testrail.example.com",
  TESTRAIL_EMAIL: "qa@example.com",
  TESTRAIL_PASSWORD: "test-secret",
};

let dir = "";
let api: InMemoryCaseApi;
let stdout: string[];
let stderr: string[];

function context(env: Record<string, string> = credentials): CliContext {
  return {
    stdout: { write: (text) => stdout.push(text) },
    stderr: { write: (text) => stderr.push(text) },
    env,
    cwd: dir,
    home: dir,
    createClient: () => api,
  };
}

function run(args: string[], env?: Record<string, string>): Promise<number> {
  return runCli(["node", "caseport", ...args], context(env));
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "caseport-cli-"));
  api = createInMemoryCaseApi({
    sections: [{ id: 10, name: "Checkout", parent_id: null, suite_id: 1 }],
    cases: [{ id: 5, title: "Existing", section_id: 10, suite_id: 1, priority_id: 2 }],
  });
  stdout = [];
  stderr = [];
  await writeFile(
    path.join(dir, "cases.csv"),
    "case_id,title,section,step,expected\n,Checkout happy path,Checkout,Add item,Cart has 1 item\n",
    "utf8",
  );
});

describe("caseport cases import", () => {
  it("previews without credentials or remote calls", async () => {
    const code = await run(["cases", "import", "cases.csv", "--project-id", "1", "--dry-run"], {});

    expect(code).toBe(0);
    expect(JSON.parse(stdout.join(""))).toMatchObject({ totalGroups: 1, createCount: 1, updateCount: 0, invalidCount: 0 });
    expect(api.calls).toEqual([]);
  });

  it("prints the summary and records the run", async () => {
    const historyFile = path.join(dir, "history", "runs.sqlite");

    const code = await run(["cases", "import", "cases.csv", "--project-id", "1", "--history-file", historyFile, "--quiet"]);

    expect(code).toBe(0);
    expect(stdout).toEqual(["Created: 1\nUpdated: 0\nFailed: 0\n"]);
    expect(stderr).toEqual([]);

    stdout = [];
    expect(await run(["history", "list", "--history-file", historyFile])).toBe(0);
    expect(JSON.parse(stdout.join(""))).toMatchObject([
      { fileName: "cases.csv", projectId: 1, suiteId: 1, createdCount: 1, failedCount: 0 },
    ]);
  });

  it("exits with 1 when a group fails", async () => {
    await writeFile(path.join(dir, "bad.csv"), "case_id,title,section\n,Lost,Nowhere\n", "utf8");

    const code = await run(["cases", "import", "bad.csv", "--project-id", "1", "--no-history", "--quiet"]);

    expect(code).toBe(1);
    expect(stdout).toEqual([
      "Created: 0\nUpdated: 0\nFailed: 1\n\nFailures:\n  - row 2 (\"Lost\"): Section not found: Nowhere in path Nowhere\n",
    ]);
  });

  it("reports missing credentials", async () => {
    const code = await run(["cases", "import", "cases.csv", "--project-id", "1", "--no-history"], {});

    expect(code).toBe(1);
    expect(stderr).toEqual([
      "Missing server URL: pass --url, set TESTRAIL_URL or add 'url' to profile 'default' in .caseport.yaml\n",
    ]);
  });
});

describe("caseport commands", () => {
  it("exports CSV to stdout", async () => {
    const code = await run(["cases", "export", "--project-id", "1", "--quiet"]);

    expect(code).toBe(0);
    expect(stdout.join("").split("\n")[1]).toBe("5,Existing,Checkout,,,2,,,,,,,,,,,");
  });

  it("filters listed fields", async () => {
    const code = await run(["cases", "get", "C5", "--output", "raw", "--fields", "id,title"]);

    expect(code).toBe(0);
    expect(stdout).toEqual(['{"id":5,"title":"Existing"}\n']);
  });

  it("fails on an unknown history entry", async () => {
    const code = await run(["history", "show", "5", "--history-file", path.join(dir, "h.sqlite")]);

    expect(code).toBe(1);
    expect(stderr).toEqual(["Import log not found: 5\n"]);
  });

  it("rejects bad option values through commander", async () => {
    const code = await run(["suites", "list", "--project-id", "abc"]);

    expect(code).toBe(1);
    expect(stderr.join("")).toContain("expected a positive integer");
  });
});
