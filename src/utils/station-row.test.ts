import { describe, expect, it } from "vitest";
import { extractNumericTuple } from "./numeric-tuple";
import { locateStationRow } from "./station-row";

const numbers = (text: string, station: string, minValues: number) => {
  const row = locateStationRow(text, station, { minValues });
  return row ? row.tokens.filter(t => t.kind === "number").map(t => t.value) : null;
};

describe("locateStationRow", () => {
  it("never bleeds into the next station's row", () => {
    const text = "P10 StationA 1,0 2,0 3,0\nP20 StationB 3,0 4,0 5,0 6,0 7,0 8,0 9,0";
    const row = locateStationRow(text, "StationA", { minValues: 7 });

    expect(row?.lines).toEqual(["P10 StationA 1,0 2,0 3,0"]);
    expect(numbers(text, "StationA", 7)).toEqual([1, 2, 3]);
  });

  it("merges wrapped continuation lines until enough numbers are found", () => {
    const text = [
      "P63 Huelma 0,5 0,0 1,0",
      "2,0 40,2 61,0",
      "210,4",
      "P64 Jódar 1 2 3 4 5 6 7",
    ].join("\n");
    const row = locateStationRow(text, "Huelma", { minValues: 7 });

    expect(row?.lines).toHaveLength(3);
    expect(numbers(text, "Huelma", 7)).toEqual([0.5, 0, 1, 2, 40.2, 61, 210.4]);
  });

  it("strips the leading station code so it is not read as a value", () => {
    const row = locateStationRow("P63 Huelma 1,0 2,0 3,0 4,0 5,0 6,0 7,0", "Huelma", { minValues: 7 });

    expect(row?.strippedCode).toBe("P63");
    expect(row && extractNumericTuple(row, 7)).toEqual({ ok: true, values: [1, 2, 3, 4, 5, 6, 7] });
  });

  it("keeps numbers that follow the name untouched", () => {
    const row = locateStationRow("Huelma P63 1,0", "Huelma", { minValues: 2 });

    expect(row?.strippedCode).toBeNull();
    expect(numbers("Huelma P63 1,0", "Huelma", 2)).toEqual([63, 1]);
  });

  it("matches the name case-insensitively on word boundaries", () => {
    const text = "Huelmaza 1 2 3 4 5 6 7\nHUELMA 9 9 9 9 9 9 9";
    expect(locateStationRow(text, "huelma", { minValues: 7 })?.lineIndex).toBe(1);
  });

  it("skips header mentions that never reach the expected count", () => {
    const text = "Estación Huelma (Jaén)\nP63 Huelma 1 2 3 4 5 6 7";
    const row = locateStationRow(text, "Huelma", { minValues: 7 });

    expect(row?.lineIndex).toBe(1);
    expect(row?.strippedCode).toBe("P63");
  });

  it("limits the number of continuation lines", () => {
    const row = locateStationRow("Huelma 1\n2\n3\n4\n5\n6\n7", "Huelma", { minValues: 7 });
    expect(row?.lines).toEqual(["Huelma 1", "2", "3", "4"]);

    const wider = locateStationRow("Huelma 1\n2\n3\n4\n5\n6\n7", "Huelma", { minValues: 7, maxContinuationLines: 6 });
    expect(wider?.lines).toHaveLength(7);
  });

  it("returns null when the station is absent", () => {
    expect(locateStationRow("P10 StationA 1,0", "Huelma", { minValues: 7 })).toBeNull();
  });
});
