import { describe, it, expect } from "vitest";
import type { Database } from "@atrium/protocol";
import {
  addOption,
  addRow,
  buildColumns,
  deleteColumn,
  deleteOption,
  deleteRow,
  replaceColumns,
  updateColumn,
  updateOption,
  updateRow,
  validateRowValues,
} from "./document.js";
import { ApiError } from "../lib/errors.js";

const NOW = "2024-05-01T00:00:00.000Z";

function makeDoc(): Database {
  const columns = buildColumns(
    [
      { id: "title", name: "Title", type: "text" },
      { id: "points", name: "Points", type: "number" },
      { id: "status", name: "Status", type: "select", options: [{ id: "todo", value: "Todo" }, { id: "done", value: "Done" }] },
    ],
    NOW
  );
  return {
    id: "db-1",
    channelId: "channel-1",
    authorId: "author-1",
    title: "Tasks",
    columns,
    rows: [
      { id: "r1", values: { title: "Write docs", points: 3, status: "todo" } },
      { id: "r2", values: { title: "Ship", status: "done" } },
    ],
    createdAt: NOW,
    updatedAt: NOW,
  };
}

describe("buildColumns", () => {
  it("fills in orders and keeps options only on select columns", () => {
    const columns = buildColumns(
      [
        { id: "a", name: "Done", type: "boolean", options: [{ value: "ignored" }] },
        { id: "b", name: "Stage", type: "select", options: [{ id: "o1", value: "New" }] },
      ],
      NOW
    );

    expect(columns).toEqual([
      { id: "a", name: "Done", type: "boolean", options: [], order: 0 },
      { id: "b", name: "Stage", type: "select", options: [{ id: "o1", value: "New", order: 0, createdAt: NOW }], order: 1 },
    ]);
  });

  it("rejects a select column without options", () => {
    expect(() => buildColumns([{ name: "Stage", type: "select" }])).toThrow(
      'Select column "Stage" requires at least one option'
    );
  });
});

describe("validateRowValues", () => {
  const columns = makeDoc().columns;

  it("accepts nulls and rejects unknown columns", () => {
    const values = { title: "x", points: 1.5, status: "done", missing: null };
    expect(() => validateRowValues(columns, { title: null, points: 2 })).not.toThrow();
    expect(() => validateRowValues(columns, values)).toThrow("Unknown column missing");
  });

  it("rejects a value of the wrong type", () => {
    expect(() => validateRowValues(columns, { points: "three" })).toThrow('Invalid value for number column "Points"');
  });

  it("rejects a select value that is not one of the options", () => {
    expect(() => validateRowValues(columns, { status: "blocked" })).toThrow('Invalid value for select column "Status"');
  });

  it("checks date columns for ISO dates", () => {
    const [due] = buildColumns([{ id: "due", name: "Due", type: "date" }]);
    expect(() => validateRowValues([due], { due: "2024-02-03" })).not.toThrow();
    expect(() => validateRowValues([due], { due: "tomorrow" })).toThrow('Invalid value for date column "Due"');
  });

  it("raises a 400 ApiError", () => {
    try {
      validateRowValues(columns, { points: true });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ApiError);
      expect(err).toMatchObject({ statusCode: 400 });
    }
  });
});

describe("rows", () => {
  it("appends a row with a fresh id", () => {
    const doc = makeDoc();
    const { doc: next, item } = addRow(doc, { title: "New" });

    expect(next.rows).toHaveLength(3);
    expect(next.rows[2]).toEqual(item);
    expect(item.id).not.toBe("");
    expect(doc.rows).toHaveLength(2);
  });

  it("replaces a row's values", () => {
    const { doc, item } = updateRow(makeDoc(), "r2", { points: 8 });

    expect(item).toEqual({ id: "r2", values: { points: 8 } });
    expect(doc.rows.map((r) => r.id)).toEqual(["r1", "r2"]);
  });

  it("reports a missing row as 404", () => {
    expect(() => updateRow(makeDoc(), "nope", {})).toThrow("Row not found");
    expect(() => deleteRow(makeDoc(), "nope")).toThrow("Row not found");
  });

  it("deletes a row", () => {
    expect(deleteRow(makeDoc(), "r1").rows.map((r) => r.id)).toEqual(["r2"]);
  });
});

describe("columns", () => {
  it("drops cell values of columns removed by a replacement", () => {
    const doc = replaceColumns(makeDoc(), [{ id: "title", name: "Title", type: "text" }]);

    expect(doc.columns.map((c) => c.id)).toEqual(["title"]);
    expect(doc.rows).toEqual([
      { id: "r1", values: { title: "Write docs" } },
      { id: "r2", values: { title: "Ship" } },
    ]);
  });

  it("renames without touching values", () => {
    const { doc, item } = updateColumn(makeDoc(), "points", { name: "Estimate" });

    expect(item.name).toBe("Estimate");
    expect(doc.rows[0].values.points).toBe(3);
  });

  it("clears values and options when the type changes", () => {
    const { doc, item } = updateColumn(makeDoc(), "status", { type: "text" });

    expect(item.type).toBe("text");
    expect(item.options).toEqual([]);
    expect(doc.rows).toEqual([
      { id: "r1", values: { title: "Write docs", points: 3 } },
      { id: "r2", values: { title: "Ship" } },
    ]);
  });

  it("requires options when a column becomes select", () => {
    expect(() => updateColumn(makeDoc(), "title", { type: "select" })).toThrow(
      'Select column "Title" requires at least one option'
    );

    const { item } = updateColumn(makeDoc(), "title", { type: "select", options: [{ id: "a", value: "A" }] });
    expect(item.options.map((o) => o.id)).toEqual(["a"]);
  });

  it("clears cells whose option disappears from a new option list", () => {
    const { doc } = updateColumn(makeDoc(), "status", { options: [{ id: "done", value: "Done" }] });

    expect(doc.rows[0].values).toEqual({ title: "Write docs", points: 3 });
    expect(doc.rows[1].values.status).toBe("done");
  });

  it("deletes a column and its values", () => {
    const doc = deleteColumn(makeDoc(), "points");

    expect(doc.columns.map((c) => c.id)).toEqual(["title", "status"]);
    expect(doc.rows[0].values).toEqual({ title: "Write docs", status: "todo" });
    expect(() => deleteColumn(doc, "points")).toThrow("Column not found");
  });
});

describe("options", () => {
  it("appends an option at the end", () => {
    const { doc, item } = addOption(makeDoc(), "status", { value: "Blocked" });

    expect(item.order).toBe(2);
    expect(doc.columns[2].options.map((o) => o.value)).toEqual(["Todo", "Done", "Blocked"]);
  });

  it("only works on select columns", () => {
    expect(() => addOption(makeDoc(), "title", { value: "x" })).toThrow(
      "Options are only available on select columns"
    );
  });

  it("updates an option in place", () => {
    const { doc, item } = updateOption(makeDoc(), "status", "todo", { value: "To do" });

    expect(item).toMatchObject({ id: "todo", value: "To do", order: 0 });
    expect(doc.columns[2].options[0].value).toBe("To do");
    expect(() => updateOption(makeDoc(), "status", "nope", {})).toThrow("Option not found");
  });

  it("clears the cells that selected a deleted option", () => {
    const doc = deleteOption(makeDoc(), "status", "todo");

    expect(doc.columns[2].options.map((o) => o.id)).toEqual(["done"]);
    expect(doc.rows[0].values).toEqual({ title: "Write docs", points: 3 });
    expect(doc.rows[1].values.status).toBe("done");
  });
});
