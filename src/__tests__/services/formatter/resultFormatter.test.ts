import { describe, expect, it } from "vitest";

import {
  attachmentDisposition,
  compactTimestamp,
  formatResult,
  readableTimestamp,
  resultFileName,
} from "@/services/formatter/resultFormatter";
import { FormatError } from "@/utils/errors";

const AT = new Date("2024-07-08T09:05:03.000Z");

describe("result formatter", () => {
  it("stamps names and subjects in UTC", () => {
    expect(compactTimestamp(AT)).toBe("20240708_090503");
    expect(readableTimestamp(AT)).toBe("2024-07-08 09:05:03");
    expect(resultFileName("daily-sales", AT)).toBe("daily-sales_20240708_090503.csv");
  });

  it("keeps plain ASCII names readable in both header forms", () => {
    expect(attachmentDisposition("daily-sales_20240708_090503.csv")).toBe(
      "attachment; filename=\"daily-sales_20240708_090503.csv\"; " +
        "filename*=UTF-8''daily-sales_20240708_090503.csv",
    );
  });

  it("encodes names outside printable ASCII", () => {
    expect(attachmentDisposition(resultFileName("отчёт", AT))).toBe(
      "attachment; filename=\"______20240708_090503.csv\"; " +
        "filename*=UTF-8''%D0%BE%D1%82%D1%87%D1%91%D1%82_20240708_090503.csv",
    );
  });

  it("escapes quotes and the characters RFC 5987 reserves", () => {
    expect(attachmentDisposition(`say "hi"'s (v2)*.csv`)).toBe(
      "attachment; filename=\"say _hi_'s (v2)*.csv\"; " +
        "filename*=UTF-8''say%20%22hi%22%27s%20%28v2%29%2A.csv",
    );
  });

  it("formats a table and rejects a ragged one", () => {
    expect(formatResult({ columns: ["a", "b"], rows: [[1, null]] })).toBe("a,b\n1,\n");
    expect(() => formatResult({ columns: ["a"], rows: [[1, 2]] })).toThrow(FormatError);
  });
});
