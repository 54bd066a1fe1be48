/**
 * targets.test.ts - Unit tests for path-selector resolution
 *
 * Uses real temporary directories so the existence checks run against the
 * actual filesystem.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { defaultLayout, resolveTargets } from "./targets";
import { CheckUsageError } from "./errors";
import type { CheckLayout } from "./types";

let root: string;
let layout: CheckLayout;

beforeAll(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "plumbline-targets-"));
  fs.mkdirSync(path.join(root, "agents"));
  fs.mkdirSync(path.join(root, "notebooks"));
  fs.writeFileSync(path.join(root, "README.md"), "not a directory\n");
  layout = {
    agentsDir: path.join(root, "agents"),
    notebooksDir: path.join(root, "notebooks"),
  };
});

afterAll(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// run action
// ---------------------------------------------------------------------------

describe("resolveTargets (run)", () => {
  it("covers both default trees when no selector is given", () => {
    expect(resolveTargets("run", {}, layout)).toEqual([
      { kind: "python", path: layout.agentsDir },
      { kind: "notebooks", path: layout.notebooksDir },
    ]);
  });

  it("narrows to the python tree with --agents-dir", () => {
    expect(
      resolveTargets("run", { agentsDir: layout.agentsDir }, layout)
    ).toEqual([{ kind: "python", path: layout.agentsDir }]);
  });

  it("narrows to the notebook tree with --notebooks-dir", () => {
    expect(
      resolveTargets("run", { notebooksDir: layout.notebooksDir }, layout)
    ).toEqual([{ kind: "notebooks", path: layout.notebooksDir }]);
  });

  it("fails when a default directory is missing", () => {
    const missing = path.join(root, "no-such-dir");
    expect(() =>
      resolveTargets("run", {}, { ...layout, notebooksDir: missing })
    ).toThrow(`Directory not found: ${missing}`);
  });
});

// ---------------------------------------------------------------------------
// fix action
// ---------------------------------------------------------------------------

describe("resolveTargets (fix)", () => {
  it("requires a path selector", () => {
    expect(() => resolveTargets("fix", {}, layout)).toThrow(
      "The fix action requires --agents-dir or --notebooks-dir."
    );
  });

  it("accepts a single selector", () => {
    expect(
      resolveTargets("fix", { notebooksDir: layout.notebooksDir }, layout)
    ).toEqual([{ kind: "notebooks", path: layout.notebooksDir }]);
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("resolveTargets validation", () => {
  it("rejects both selectors together", () => {
    expect(() =>
      resolveTargets(
        "run",
        { agentsDir: layout.agentsDir, notebooksDir: layout.notebooksDir },
        layout
      )
    ).toThrow(CheckUsageError);
  });

  it("rejects a selector pointing at a file", () => {
    const file = path.join(root, "README.md");
    expect(() => resolveTargets("run", { agentsDir: file }, layout)).toThrow(
      `Directory not found: ${file}`
    );
  });

  it("rejects an empty path", () => {
    expect(() => resolveTargets("fix", { agentsDir: "" }, layout)).toThrow(
      "Directory path must not be empty."
    );
  });
});

describe("defaultLayout", () => {
  it("uses ./agents and ./notebooks by default", () => {
    expect(defaultLayout({})).toEqual({
      agentsDir: "./agents",
      notebooksDir: "./notebooks",
    });
  });

  it("honors environment overrides", () => {
    expect(
      defaultLayout({
        PLUMBLINE_AGENTS_DIR: "src/agents",
        PLUMBLINE_NOTEBOOKS_DIR: "docs/notebooks",
      })
    ).toEqual({ agentsDir: "src/agents", notebooksDir: "docs/notebooks" });
  });
});
