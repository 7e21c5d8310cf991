import { describe, expect, it } from "vitest";
import { buildCsvText, normalizeCaseId, parseCsvRows, parseList, parseTestStepsCell } from "./csv.js";
import { MalformedRowError } from "./errors.js";

describe("parseCsvRows", () => {
  it("splits core columns, extra fields and the row's step", () => {
    const csv = [
      "case_id,title,section,priority_id,custom_automated,step,expected",
      "C12,Login works,Auth/Login,2,true,Open page,Page shown",
      ",Logout,Auth,,,Click logout,",
    ].join("\n");

    const { header, rows } = parseCsvRows(csv);

    expect(header).toEqual(["case_id", "title", "section", "priority_id", "custom_automated", "step", "expected"]);
    expect(rows).toEqual([
      {
        rowNumber: 2,
        caseId: "12",
        title: "Login works",
        section: "Auth/Login",
        fields: { priority_id: "2", custom_automated: "true" },
        steps: [{ content: "Open page", expected: "Page shown", additionalInfo: "", refs: "" }],
      },
      {
        rowNumber: 3,
        caseId: "",
        title: "Logout",
        section: "Auth",
        fields: { priority_id: "", custom_automated: "" },
        steps: [{ content: "Click logout", expected: "", additionalInfo: "", refs: "" }],
      },
    ]);
  });

  it("skips blank records without renumbering the rest", () => {
    const { rows } = parseCsvRows("case_id,title\n1,A\n,\n2,B\n");
    expect(rows.map((row) => [row.rowNumber, row.title])).toEqual([
      [2, "A"],
      [4, "B"],
    ]);
  });

  it("gives a row with blank step columns no steps", () => {
    const { rows } = parseCsvRows("case_id,title,step,expected,additional_info,step_refs\n,Explore,,,,\n");
    expect(rows[0].steps).toEqual([]);
  });

  it("keeps a blank step on rows that name their steps field", () => {
    const csv = [
      "case_id,title,steps_field,step,expected",
      "4,Steps,custom_steps_separated,a,x",
      "4,Steps,custom_steps_separated,,",
      "4,Steps,custom_steps_separated,b,y",
      "5,No steps,,,",
    ].join("\n");

    const { rows } = parseCsvRows(csv);

    expect(rows.map((row) => row.steps.map((step) => step.content))).toEqual([["a"], [""], ["b"], []]);
    expect(rows[1].steps).toEqual([{ content: "", expected: "", additionalInfo: "", refs: "" }]);
  });

  it("keeps quoted and padded cells as written", () => {
    const { rows } = parseCsvRows('case_id,title,refs\n1,"Hello, world", R-1 \n');
    expect(rows[0].title).toBe("Hello, world");
    expect(rows[0].fields.refs).toBe(" R-1 ");
  });

  it("reads teststeps lines, then numbered steps, in order", () => {
    const csv = [
      "case_id,title,teststeps,step_2,expected_2,step_1,expected_1",
      ',T,"Open | Shown | note\nClose | Gone",Second,Two,First,One',
    ].join("\n");

    const { rows } = parseCsvRows(csv);

    expect(rows[0].fields).toEqual({});
    expect(rows[0].steps).toEqual([
      { content: "Open", expected: "Shown", additionalInfo: "note", refs: "" },
      { content: "Close", expected: "Gone", additionalInfo: "", refs: "" },
      { content: "First", expected: "One", additionalInfo: "", refs: "" },
      { content: "Second", expected: "Two", additionalInfo: "", refs: "" },
    ]);
  });

  it("applies column aliases before checking for case_id", () => {
    const { rows } = parseCsvRows("ID,Name\n5,Thing\n", { columnAliases: { ID: "case_id", Name: "title" } });
    expect(rows[0].caseId).toBe("5");
    expect(rows[0].title).toBe("Thing");
  });

  it("rejects a header without case_id", () => {
    expect(() => parseCsvRows("title,section\nA,B\n")).toThrow(MalformedRowError);
    expect(() => parseCsvRows("title,section\nA,B\n")).toThrow("Missing required column 'case_id' in header");
  });

  it("rejects duplicate header names", () => {
    expect(() => parseCsvRows("case_id,title,title\n1,A,B\n")).toThrow("Row 1: Duplicate column 'title' in header");
  });

  it("rejects empty input and broken quoting", () => {
    expect(() => parseCsvRows("")).toThrow("CSV has no header row");
    expect(() => parseCsvRows('case_id,title\n1,"oops\n')).toThrow(/^Unreadable CSV:/);
  });
});

describe("csv helpers", () => {
  it("normalizes display-form case ids", () => {
    expect(normalizeCaseId(" C42 ")).toBe("42");
    expect(normalizeCaseId("c7")).toBe("7");
    expect(normalizeCaseId("CX1")).toBe("CX1");
    expect(normalizeCaseId("")).toBe("");
  });

  it("splits escaped newlines in a teststeps cell", () => {
    expect(parseTestStepsCell("a | b\\nc")).toEqual([
      { content: "a", expected: "b", additionalInfo: "", refs: "" },
      { content: "c", expected: "", additionalInfo: "", refs: "" },
    ]);
  });

  it("parses comma lists", () => {
    expect(parseList(" 1, 2,,3 ")).toEqual(["1", "2", "3"]);
    expect(parseList(undefined)).toEqual([]);
  });

  it("escapes cells that need quoting", () => {
    const text = buildCsvText(["a", "b"], [
      { a: "x,y", b: 'say "hi"' },
      { a: 1, b: null },
    ]);
    expect(text).toBe('a,b\n"x,y","say ""hi"""\n1,\n');
    expect(buildCsvText(["a"], [])).toBe("a\n");
  });
});
