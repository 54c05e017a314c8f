import { describe, expect, test } from "vitest";
import { buildHierarchy } from "../src/report/hierarchy.js";
import { parseHierarchyRecords } from "../src/report/records.js";
import { renderHierarchyText } from "../src/report/render.js";

const SCENARIO = "id;dept;team;role;level;salary\n1;Eng;Backend;dev;2;1000\n2;Eng;Frontend;dev;2;3000\n";

const STAFF = [
  "id;dept;team;role;level;salary",
  "1;Ops;Infra;admin;1;900",
  "2;Eng;Backend;dev;2;1000",
  "3;Ops;Support;agent;1;700",
  "4;Eng;Backend;lead;3;2500",
  "5;HR;People;partner;2;1200",
  "6;Ops;Infra;admin;2;1100",
  ""
].join("\n");

describe("department hierarchy", () => {
  test("groups the sample rows under their department", () => {
    const h = buildHierarchy(parseHierarchyRecords(SCENARIO, ";"));
    expect([...h.keys()]).toEqual(["Eng"]);
    expect([...(h.get("Eng") ?? [])]).toEqual(["Backend", "Frontend"]);
  });

  test("recovers exactly the distinct departments in first-seen order", () => {
    const h = buildHierarchy(parseHierarchyRecords(STAFF, ";"));
    expect([...h.keys()]).toEqual(["Ops", "Eng", "HR"]);
    expect([...(h.get("Ops") ?? [])]).toEqual(["Infra", "Support"]);
    expect([...(h.get("Eng") ?? [])]).toEqual(["Backend"]);
    expect([...(h.get("HR") ?? [])]).toEqual(["People"]);
  });

  test("does not merge departments that differ only in case or spacing", () => {
    const h = buildHierarchy([
      { department: "Eng", team: "Backend" },
      { department: "eng", team: "Backend" },
      { department: "Eng ", team: "Backend" }
    ]);
    expect(h.size).toBe(3);
  });

  test("header-only input yields an empty hierarchy", () => {
    const h = buildHierarchy(parseHierarchyRecords("id;dept;team;role;level;salary\n", ";"));
    expect(h.size).toBe(0);
    expect(renderHierarchyText(h)).toBe("");
  });

  test("renders departments with their teams indented", () => {
    const h = buildHierarchy(parseHierarchyRecords(STAFF, ";"));
    expect(renderHierarchyText(h)).toBe(
      [
        "Department: Ops",
        "\tTeam: Infra",
        "\tTeam: Support",
        "Department: Eng",
        "\tTeam: Backend",
        "Department: HR",
        "\tTeam: People",
        ""
      ].join("\n")
    );
  });
});
