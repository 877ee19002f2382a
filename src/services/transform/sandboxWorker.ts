/**
 * Source of the worker thread that hosts one transformation run.
 *
 * The worker receives `{ code, input }` as workerData, where `input` is the
 * dataset as JSON text. Everything user code can touch is created inside a
 * fresh vm context by CONTEXT_PRELUDE: the row records, the helper library
 * and `console`. Only strings cross between the worker and the context, so no
 * value of the worker's own realm (and its `Function`) is reachable.
 *
 * The worker posts `log` messages followed by exactly one result message:
 * `records`, `table`, `invalid` or `error`.
 */
const CONTEXT_PRELUDE = `
(function setup(inputJson) {
  "use strict";

  const stringify = JSON.stringify;
  const parseJson = JSON.parse;
  const isArray = Array.isArray;
  const keysOf = Object.keys;
  const protoOf = Object.getPrototypeOf;
  const tagOf = (value) => Object.prototype.toString.call(value);
  const MAX_LOG_LINES = 200;
  const logs = [];

  function describe(value) {
    if (value === null) return "null";
    if (isArray(value)) return "array";
    if (typeof value !== "object") return typeof value;
    const proto = protoOf(value);
    if (proto === null) return "object";
    const ctor = proto.constructor;
    return typeof ctor === "function" && ctor.name ? ctor.name : "object";
  }

  function isRecord(value) {
    if (typeof value !== "object" || value === null || isArray(value)) return false;
    const proto = protoOf(value);
    return proto === null || proto === Object.prototype;
  }

  function normalizeCell(value, where) {
    if (value === null || value === undefined) return { ok: true, value: null };
    switch (typeof value) {
      case "number":
        return { ok: true, value: Number.isFinite(value) ? value : null };
      case "string":
      case "boolean":
        return { ok: true, value: value };
      case "bigint":
        return { ok: true, value: value.toString() };
      case "function":
      case "symbol":
        return { ok: false, reason: where + " holds a " + typeof value };
    }
    if (tagOf(value) === "[object Date]") {
      const time = value.getTime();
      return { ok: true, value: Number.isNaN(time) ? null : value.toISOString() };
    }
    try {
      return { ok: true, value: stringify(value) };
    } catch (error) {
      return { ok: false, reason: where + " cannot be serialized" };
    }
  }

  function collectRecords(candidate) {
    const records = [];
    for (let index = 0; index < candidate.length; index += 1) {
      const row = candidate[index];
      if (!isRecord(row)) {
        return { status: "invalid", producedType: "array", reason: "item " + index + " is " + describe(row) };
      }
      const record = {};
      for (const key of keysOf(row)) {
        const cell = normalizeCell(row[key], "row " + index + " column '" + key + "'");
        if (!cell.ok) return { status: "invalid", producedType: "array", reason: cell.reason };
        record[key] = cell.value;
      }
      records.push(record);
    }
    return { status: "records", records: records };
  }

  function collectTable(candidate) {
    const columns = [];
    for (const column of candidate.columns) {
      if (typeof column !== "string") {
        return { status: "invalid", producedType: "object", reason: "column names must be strings" };
      }
      columns.push(column);
    }
    const rows = [];
    for (let index = 0; index < candidate.rows.length; index += 1) {
      const row = candidate.rows[index];
      if (!isArray(row)) {
        return { status: "invalid", producedType: "object", reason: "row " + index + " is " + describe(row) };
      }
      const cells = [];
      for (let position = 0; position < row.length; position += 1) {
        const cell = normalizeCell(row[position], "row " + index + " cell " + position);
        if (!cell.ok) return { status: "invalid", producedType: "object", reason: cell.reason };
        cells.push(cell.value);
      }
      rows.push(cells);
    }
    return { status: "table", columns: columns, rows: rows };
  }

  function collect(candidate) {
    if (isArray(candidate)) return collectRecords(candidate);
    if (isRecord(candidate) && isArray(candidate.columns) && isArray(candidate.rows)) {
      return collectTable(candidate);
    }
    return { status: "invalid", producedType: describe(candidate) };
  }

  function numbers(values) {
    return Array.from(values).filter((value) => typeof value === "number" && Number.isFinite(value));
  }

  function keyReader(key) {
    return typeof key === "function" ? key : (row) => row[key];
  }

  function logLine(...args) {
    if (logs.length >= MAX_LOG_LINES) return;
    const parts = args.map((arg) => {
      if (typeof arg === "string") return arg;
      const cell = normalizeCell(arg, "log");
      return cell.ok ? String(cell.value) : "[" + typeof arg + "]";
    });
    logs.push(parts.join(" "));
  }

  const globals = {
    sum: (values) => numbers(values).reduce((total, value) => total + value, 0),
    mean: (values) => {
      const picked = numbers(values);
      return picked.length === 0 ? null : picked.reduce((total, value) => total + value, 0) / picked.length;
    },
    min: (values) => {
      const picked = numbers(values);
      return picked.length === 0 ? null : Math.min(...picked);
    },
    max: (values) => {
      const picked = numbers(values);
      return picked.length === 0 ? null : Math.max(...picked);
    },
    round: (value, digits = 0) => {
      const factor = 10 ** digits;
      return Math.round(value * factor) / factor;
    },
    unique: (values) => Array.from(new Set(values)),
    pick: (rows, columns) =>
      rows.map((row) =>
        Object.fromEntries(columns.map((column) => [column, row[column] === undefined ? null : row[column]])),
      ),
    groupBy: (rows, key) => {
      const read = keyReader(key);
      const groups = {};
      for (const row of rows) {
        const group = String(read(row));
        if (!groups[group]) groups[group] = [];
        groups[group].push(row);
      }
      return groups;
    },
    sortBy: (rows, key, direction = "asc") => {
      const read = keyReader(key);
      const sign = direction === "desc" ? -1 : 1;
      return [...rows].sort((left, right) => {
        const a = read(left);
        const b = read(right);
        if (a === b) return 0;
        if (a === null || a === undefined) return 1;
        if (b === null || b === undefined) return -1;
        return a < b ? -sign : sign;
      });
    },
    table: (columns, rows) => ({ columns: [...columns], rows: rows.map((row) => [...row]) }),
    parseDate: (value) => {
      const date = new Date(value);
      return Number.isNaN(date.getTime()) ? null : date;
    },
    formatDate: (value) => {
      const date = new Date(value);
      return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
    },
    addDays: (value, days) => {
      const date = new Date(value);
      date.setUTCDate(date.getUTCDate() + days);
      return date;
    },
    diffDays: (later, earlier) =>
      Math.round((new Date(later).getTime() - new Date(earlier).getTime()) / 86400000),
    console: { log: logLine, info: logLine, warn: logLine, error: logLine },
  };

  const dataset = parseJson(inputJson);
  globals.input = dataset.rows.map((row) => {
    const record = {};
    dataset.columns.forEach((column, index) => {
      record[column] = row[index];
    });
    return record;
  });
  globals.output = undefined;

  for (const name of keysOf(globals)) {
    globalThis[name] = globals[name];
  }

  return function finish(failed, thrown) {
    let result;
    if (failed) {
      const isObject = typeof thrown === "object" && thrown !== null;
      result = {
        status: "error",
        errorName: isObject && typeof thrown.name === "string" ? thrown.name : describe(thrown),
        message: isObject && typeof thrown.message === "string" ? thrown.message : String(thrown),
      };
    } else {
      const output = globalThis.output;
      const usedInput = output === undefined || output === null;
      result = collect(usedInput ? globalThis.input : output);
      result.usedInput = usedInput;
    }
    return stringify({ logs: logs, result: result });
  };
})
`;

export const SANDBOX_WORKER_SOURCE = `
"use strict";
const { parentPort, workerData } = require("node:worker_threads");
const vm = require("node:vm");

const context = vm.createContext(Object.create(null), {
  name: "transform",
  codeGeneration: { strings: false, wasm: false },
  microtaskMode: "afterEvaluate",
});

function report(payload) {
  if (typeof payload !== "string") {
    parentPort.postMessage({ status: "error", errorName: "Error", message: "Transform result could not be read" });
    return;
  }
  const parsed = JSON.parse(payload);
  for (const line of parsed.logs) {
    parentPort.postMessage({ status: "log", message: line });
  }
  parentPort.postMessage(parsed.result);
}

const setup = vm.runInContext(${JSON.stringify(CONTEXT_PRELUDE)}, context, { filename: "prelude.js" });
const finish = setup(workerData.input);

let failed = false;
let thrown;
try {
  vm.runInContext(workerData.code, context, { filename: "transform.js" });
} catch (error) {
  failed = true;
  thrown = error;
}

try {
  report(finish(failed, thrown));
} catch (error) {
  parentPort.postMessage({ status: "error", errorName: "Error", message: "Transform result could not be read" });
}
`;
