"use client";

import { useState } from "react";
import type { LineResolution, MarkerMatching, NumericParsing, ScanStats } from "@/lib/passFail";
import { getErrorMessage } from "@/lib/utils/error";

type ScanResponse =
  | { ok: true; hasPendingMarkers: boolean; text: string; stats: ScanStats; details: LineResolution[] }
  | { ok: false; error: string };

/**
 * Paste a test log, resolve its PASS/FAIL markers, copy the result.
 */
export default function PassFailPage() {
  const [input, setInput] = useState("");
  const [numericParsing, setNumericParsing] = useState<NumericParsing>("UNIT_AWARE");
  const [markerMatching, setMarkerMatching] = useState<MarkerMatching>("DECORATED");
  const [result, setResult] = useState<ScanResponse | null>(null);
  const [isProcessing, setIsProcessing] = useState(false);

  const handleProcess = async () => {
    setIsProcessing(true);
    try {
      const response = await fetch("/api/scan", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text: input, numericParsing, markerMatching }),
      });
      const data: ScanResponse = await response.json();
      setResult(data);
    } catch (error) {
      console.error("Error processing log:", error);
      setResult({ ok: false, error: getErrorMessage(error) });
    } finally {
      setIsProcessing(false);
    }
  };

  return (
    <main style={{ maxWidth: 960, margin: "0 auto", padding: "32px 16px" }}>
      <h1 style={{ fontSize: 24, marginBottom: 8 }}>Pass/Fail Resolver</h1>
      <p style={{ color: "#9ca3af", marginBottom: 16 }}>
        Lines ending in PASS/FAIL are checked against the nearest S/B criteria and rewritten.
        Lines that cannot be decided are left as they are.
      </p>

      <textarea
        value={input}
        onChange={(e) => setInput(e.target.value)}
        rows={16}
        spellCheck={false}
        placeholder={"MP 1 = 50\nS/B 0 to 100\nMP 1 PASS/FAIL"}
        style={{ width: "100%", fontFamily: "monospace", fontSize: 13 }}
      />

      <div style={{ display: "flex", gap: 16, alignItems: "center", margin: "12px 0" }}>
        <label>
          Numbers{" "}
          <select value={numericParsing} onChange={(e) => setNumericParsing(e.target.value === "STRICT" ? "STRICT" : "UNIT_AWARE")}>
            <option value="UNIT_AWARE">Ignore trailing units</option>
            <option value="STRICT">Strict</option>
          </select>
        </label>
        <label>
          Marker{" "}
          <select value={markerMatching} onChange={(e) => setMarkerMatching(e.target.value === "EXACT" ? "EXACT" : "DECORATED")}>
            <option value="DECORATED">Allow trailing asterisks</option>
            <option value="EXACT">Exact</option>
          </select>
        </label>
        <button onClick={handleProcess} disabled={isProcessing || input.trim().length === 0}>
          {isProcessing ? "Processing..." : "Process"}
        </button>
      </div>

      {result && !result.ok && <div style={{ color: "#f87171" }}>Error: {result.error}</div>}

      {result && result.ok && !result.hasPendingMarkers && (
        <div style={{ color: "#9ca3af" }}>No PASS/FAIL conditions found.</div>
      )}

      {result && result.ok && result.hasPendingMarkers && (
        <section>
          <p>
            {result.stats.total} instances: {result.stats.passed} PASS, {result.stats.failed} FAIL,{" "}
            {result.stats.unchanged} unchanged
          </p>
          {result.stats.failed > 0 && <p>FAIL at lines: {result.stats.failedLineNumbers.join(", ")}</p>}
          {result.stats.unchanged > 0 && (
            <p>Unchanged at lines: {result.stats.unchangedLineNumbers.join(", ")}</p>
          )}
          <textarea
            readOnly
            value={result.text}
            rows={16}
            style={{ width: "100%", fontFamily: "monospace", fontSize: 13 }}
          />
        </section>
      )}
    </main>
  );
}
