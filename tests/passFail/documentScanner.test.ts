/**
 * Document Scanner Tests
 *
 * Full-document scans: criteria lookup, value resolution, marker rewriting,
 * statistics and per-document history.
 */

import { describe, it, expect } from "vitest";
import { hasPendingMarkers, scanDocument } from "@/lib/passFail/documentScanner";
import { joinLines, splitLines } from "@/lib/passFail/lines";
import { PENDING_MARKER } from "@/lib/passFail/markers";
import type { InterpreterSettings } from "@/lib/passFail/types";

const STRICT: InterpreterSettings = { numericParsing: "STRICT", markerMatching: "DECORATED" };
const EXACT: InterpreterSettings = { numericParsing: "UNIT_AWARE", markerMatching: "EXACT" };

function filler(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `NOTE step ${i + 1}`);
}

describe("Document Scanner", () => {
  describe("scanDocument", () => {
    it("should resolve a bare sentinel from the measurement above it", () => {
      const result = scanDocument(["MP 1 = 50", "S/B 0 to 100", "MP 1 PASS/FAIL"]);

      expect(result.lines).toEqual(["MP 1 = 50", "S/B 0 to 100", "MP 1 PASS"]);
      expect(result.stats).toEqual({
        total: 1,
        passed: 1,
        failed: 0,
        failedLineNumbers: [],
        unchanged: 0,
        unchangedLineNumbers: [],
      });
      expect(result.details).toEqual([
        {
          lineNumber: 3,
          criteriaText: "0 to 100",
          criteriaKind: "RANGE",
          measuredValue: "50",
          verdict: "PASS",
        },
      ]);
    });

    it("should leave an already processed document untouched", () => {
      const first = scanDocument(["S/B 0 to 100", "MP 1 = 50 PASS/FAIL"]);
      const second = scanDocument(first.lines);

      expect(second.lines).toEqual(first.lines);
      expect(second.stats.total).toBe(0);
    });

    it("should drop marker decoration when rewriting", () => {
      const result = scanDocument(["S/B 27535 +/- 5", "MP 10 = 27538 PASS/FAIL **"]);
      expect(result.lines[1]).toBe("MP 10 = 27538 PASS");
    });

    it("should rewrite every decoration it detects", () => {
      const result = scanDocument([
        "S/B 0 to 100",
        "MP 1 = 50 PASS/FAIL *\t*",
        "MP 1 = 70 PASS/FAIL \t**\r\n",
      ]);

      expect(result.lines.slice(1)).toEqual(["MP 1 = 50 PASS", "MP 1 = 70 PASS\r\n"]);
      expect(result.stats.passed).toBe(2);
      expect(hasPendingMarkers(result.lines)).toBe(false);
    });

    it("should ignore decorated markers when matching is EXACT", () => {
      const result = scanDocument(["S/B 27535 +/- 5", "MP 10 = 27538 PASS/FAIL **"], EXACT);
      expect(result.lines[1]).toBe("MP 10 = 27538 PASS/FAIL **");
      expect(result.stats.total).toBe(0);
    });

    it("should keep tabs and line terminators", () => {
      const text = "S/B 27535 +/- 5\r\nMP 10 = 27541\tPASS/FAIL\r\n";
      const result = scanDocument(splitLines(text));
      expect(joinLines(result.lines)).toBe("S/B 27535 +/- 5\r\nMP 10 = 27541\tFAIL\r\n");
      expect(result.stats.failedLineNumbers).toEqual([2]);
    });

    it("should find criteria up to nine lines above the marker", () => {
      const result = scanDocument(["S/B 0 to 100", ...filler(8), "MP 1 = 50 PASS/FAIL"]);
      expect(result.lines[9]).toBe("MP 1 = 50 PASS");
    });

    it("should leave the marker when the criteria is ten lines above", () => {
      const result = scanDocument(["S/B 0 to 100", ...filler(9), "MP 1 = 50 PASS/FAIL"]);

      expect(result.lines[10]).toBe("MP 1 = 50 PASS/FAIL");
      expect(result.stats.unchangedLineNumbers).toEqual([11]);
      expect(result.details[0].reason).toBe("NO_CRITERIA");
    });

    it("should join a placeholder criteria with the may-be line below it", () => {
      const result = scanDocument([
        "S/B XX",
        "May be 1 - 3, A or B",
        "MODE = B PASS/FAIL",
        "MODE = D PASS/FAIL",
      ]);

      expect(result.lines.slice(2)).toEqual(["MODE = B PASS", "MODE = D FAIL"]);
      expect(result.stats.failedLineNumbers).toEqual([4]);
      expect(result.details[0].criteriaText).toBe("XX May be 1 - 3, A or B");
      expect(result.details[0].criteriaKind).toBe("SET");
    });

    it("should resolve inline cross-references", () => {
      const result = scanDocument([
        "VEN2.01 = 001D",
        "MP 285 = 1D",
        "MP 285 S/B = VEN2.01 PASS/FAIL",
      ]);

      expect(result.lines[2]).toBe("MP 285 S/B = VEN2.01 PASS");
      expect(result.details[0].measuredValue).toBe("1D");
    });

    it("should read the pending line's own value for a cross-reference found above", () => {
      const result = scanDocument([
        "VEN2.01 = 001D",
        "S/B = VEN2.01",
        "MP 285 = 1D PASS/FAIL",
        "S/B = VEN2.01",
        "MP 286 = 1E PASS/FAIL",
      ]);

      expect(result.lines[2]).toBe("MP 285 = 1D PASS");
      expect(result.lines[4]).toBe("MP 286 = 1E FAIL");
      expect(result.details[0]).toEqual({
        lineNumber: 3,
        criteriaText: "= VEN2.01",
        criteriaKind: "CROSS_REFERENCE",
        measuredValue: "1D",
        verdict: "PASS",
      });
    });

    it("should leave unresolved cross-references unchanged", () => {
      const result = scanDocument(["MP 285 = 1D", "MP 285 S/B = VEN2.01 PASS/FAIL"]);

      expect(result.lines[1]).toBe("MP 285 S/B = VEN2.01 PASS/FAIL");
      expect(result.stats.unchanged).toBe(1);
      expect(result.stats.unchangedLineNumbers).toEqual([2]);
      expect(result.details[0].reason).toBe("INCONCLUSIVE");
    });

    it("should compare against the previous value of the same parameter", () => {
      const lines = [
        "S/B Greater than previous MP 1",
        "MP 1 = 10 PASS/FAIL",
        "S/B Greater than previous MP 1",
        "MP 1 = 15 PASS/FAIL",
        "S/B Greater than previous MP 1",
        "MP 1 = 12 PASS/FAIL",
      ];
      const result = scanDocument(lines);

      expect(result.lines.filter((_, i) => i % 2 === 1)).toEqual([
        "MP 1 = 10 PASS",
        "MP 1 = 15 PASS",
        "MP 1 = 12 FAIL",
      ]);
      expect(result.stats.failedLineNumbers).toEqual([6]);
    });

    it("should start every scan with an empty history", () => {
      const lines = ["S/B Greater than previous MP 1", "MP 1 = 10 PASS/FAIL"];
      scanDocument(["S/B 0 to 100", "MP 1 = 50 PASS/FAIL"]);
      expect(scanDocument(lines).lines[1]).toBe("MP 1 = 10 PASS");
    });

    it("should leave unvalidatable criteria unchanged", () => {
      const result = scanDocument(["S/B Greater than previous", "MP 2 = 5 PASS/FAIL"]);

      expect(result.lines[1]).toBe("MP 2 = 5 PASS/FAIL");
      expect(result.details[0].criteriaKind).toBe("UNVALIDATABLE");
      expect(result.details[0].reason).toBe("INCONCLUSIVE");
    });

    it("should report a missing value", () => {
      const result = scanDocument(["S/B 0 to 100", "MP 7 PASS/FAIL"]);

      expect(result.details).toEqual([
        {
          lineNumber: 2,
          criteriaText: "0 to 100",
          criteriaKind: "RANGE",
          measuredValue: null,
          verdict: "INCONCLUSIVE",
          reason: "NO_VALUE",
        },
      ]);
    });

    it("should pass an empty measurement when blank is allowed", () => {
      const result = scanDocument(["S/B 0 or blank", "MP 4 = PASS/FAIL"]);
      expect(result.lines[1]).toBe("MP 4 = PASS");
    });

    it("should read units only when numeric parsing is UNIT_AWARE", () => {
      const lines = ["S/B 27.5 +/- 0.5", "FREQ = 27.5 Hz PASS/FAIL"];

      expect(scanDocument(lines).lines[1]).toBe("FREQ = 27.5 Hz PASS");
      expect(scanDocument(lines, STRICT).lines[1]).toBe("FREQ = 27.5 Hz FAIL");
    });
  });

  describe("hasPendingMarkers", () => {
    it("should follow the marker matching setting", () => {
      const lines = ["MP 1 = 2", "MP 1 = 2 PASS/FAIL *"];

      expect(hasPendingMarkers(lines)).toBe(true);
      expect(hasPendingMarkers(lines, EXACT)).toBe(false);
    });

    it("should recognise the exported marker text", () => {
      expect(PENDING_MARKER).toBe("PASS/FAIL");
      expect(hasPendingMarkers([`MP 1 = 2 ${PENDING_MARKER}`], EXACT)).toBe(true);
    });

    it("should not treat resolved lines as pending", () => {
      expect(hasPendingMarkers(["MP 1 = 2 PASS", "MP 2 = 3 FAIL"])).toBe(false);
    });
  });
});
