// A table is a plain array of rows, each row a JSON object decoded from the API
export type Row = Record<string, unknown>;
export type Table = Row[];

function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Turns a decoded JSON body into a table. The API always answers with an
 * array of objects; anything else is reported instead of guessed at.
 */
export function toTable(data: unknown): Table {
  if (!Array.isArray(data)) {
    throw new TypeError(
      `Expected a JSON array of objects, received ${typeof data}`
    );
  }

  return data.map((item, index) => {
    if (!isRow(item)) {
      throw new TypeError(`Expected an object at index ${index}`);
    }
    return item;
  });
}

// Union of keys over all rows, in first-seen order
export function columnsOf(table: Table): string[] {
  const columns = new Set<string>();
  table.forEach((row) => {
    Object.keys(row).forEach((key) => columns.add(key));
  });
  return [...columns];
}

/**
 * Promotes the nested content of `column` into top-level columns.
 *
 * A list cell is exploded into one row per element before its fields are
 * merged; an object cell is merged in place. The input is left untouched.
 */
export function flattenColumn(table: Table, column: string): Table {
  // Some endpoints omit the nested structure entirely, e.g. empty results
  if (!table.some((row) => column in row)) {
    return table;
  }

  const flattened: Table = [];

  for (const row of table) {
    const { [column]: nested, ...rest } = row;
    // An empty list still keeps its row
    const elements =
      Array.isArray(nested) && nested.length > 0 ? nested : [nested];

    for (const element of elements) {
      flattened.push(isRow(element) ? { ...rest, ...element } : { ...rest });
    }
  }

  return flattened;
}
