import { describe, expect, it } from "vitest";
import { columnsOf, flattenColumn, toTable, type Table } from "./table-flattener";

describe("flattenColumn", () => {
  it("explodes list cells into one row per element", () => {
    const table: Table = [
      {
        id: 1,
        component: "NO2",
        values: [
          { value: 10, unit: "µg/m³" },
          { value: 12, unit: "µg/m³" },
          { value: 9, unit: "µg/m³" },
        ],
      },
      { id: 2, component: "PM10", values: [{ value: 4, unit: "µg/m³" }] },
    ];

    expect(flattenColumn(table, "values")).toEqual([
      { id: 1, component: "NO2", value: 10, unit: "µg/m³" },
      { id: 1, component: "NO2", value: 12, unit: "µg/m³" },
      { id: 1, component: "NO2", value: 9, unit: "µg/m³" },
      { id: 2, component: "PM10", value: 4, unit: "µg/m³" },
    ]);
  });

  it("merges object cells without duplicating the row", () => {
    const table: Table = [
      { station: "Kirkeveien", position: { latitude: 59.93, longitude: 10.72 } },
    ];

    expect(flattenColumn(table, "position")).toEqual([
      { station: "Kirkeveien", latitude: 59.93, longitude: 10.72 },
    ]);
  });

  it("returns the table unchanged when the column is missing", () => {
    const table: Table = [{ area: "Oslo" }, { area: "Bergen" }];

    const result = flattenColumn(table, "values");

    expect(result).toEqual([{ area: "Oslo" }, { area: "Bergen" }]);
    expect(columnsOf(result)).toEqual(["area"]);
  });

  it("treats an empty table as having no columns", () => {
    expect(flattenColumn([], "aqis")).toEqual([]);
  });

  it("keeps a row whose list is empty", () => {
    const table: Table = [{ component: "O3", aqis: [] }];

    expect(flattenColumn(table, "aqis")).toEqual([{ component: "O3" }]);
  });

  it("passes rows with scalar or missing cells through without the column", () => {
    const table: Table = [
      { component: "NO2", aqis: 3 },
      { component: "PM10", aqis: null },
      { component: "PM2.5" },
      { component: "O3", aqis: [{ index: 1 }] },
    ];

    const result = flattenColumn(table, "aqis");

    expect(result).toEqual([
      { component: "NO2" },
      { component: "PM10" },
      { component: "PM2.5" },
      { component: "O3", index: 1 },
    ]);
    expect(columnsOf(result)).toEqual(["component", "index"]);
  });

  it("places nested fields after the remaining columns", () => {
    const table: Table = [{ aqis: { index: 2, color: "ffff00" }, component: "SO2" }];

    const [row] = flattenColumn(table, "aqis");

    expect(Object.keys(row)).toEqual(["component", "index", "color"]);
  });

  it("does not mutate its input", () => {
    const table: Table = [{ component: "NO2", aqis: [{ index: 1 }, { index: 2 }] }];

    flattenColumn(table, "aqis");

    expect(table).toEqual([{ component: "NO2", aqis: [{ index: 1 }, { index: 2 }] }]);
  });

  it("grows the table by the sum of list lengths minus one", () => {
    const table: Table = [
      { id: "a", values: [{ v: 1 }, { v: 2 }, { v: 3 }, { v: 4 }] },
      { id: "b", values: { v: 5 } },
      { id: "c", values: [{ v: 6 }, { v: 7 }] },
    ];

    const result = flattenColumn(table, "values");

    expect(result).toHaveLength(table.length + 3 + 0 + 1);
    expect(result.filter((row) => row.id === "a").map((row) => row.v)).toEqual([
      1, 2, 3, 4,
    ]);
  });
});

describe("toTable", () => {
  it("accepts an array of objects", () => {
    expect(toTable([{ area: "Oslo" }])).toEqual([{ area: "Oslo" }]);
  });

  it("rejects a body that is not an array", () => {
    expect(() => toTable({ area: "Oslo" })).toThrow(
      "Expected a JSON array of objects, received object"
    );
  });

  it("rejects array items that are not objects", () => {
    expect(() => toTable([{ area: "Oslo" }, "Bergen"])).toThrow(
      "Expected an object at index 1"
    );
  });
});

describe("columnsOf", () => {
  it("collects keys across rows in first-seen order", () => {
    expect(columnsOf([{ a: 1, b: 2 }, { c: 3, a: 4 }])).toEqual(["a", "b", "c"]);
  });
});
