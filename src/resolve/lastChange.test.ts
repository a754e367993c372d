import { describe, expect, it } from "vitest";
import { formatLastChange, parseLastChange } from "./lastChange";

function parsedAs(raw: string): string | undefined {
  const parsed = parseLastChange(raw);
  return parsed ? formatLastChange(parsed) : undefined;
}

describe("parseLastChange", () => {
  it("parses the registry's 24-hour rendering", () => {
    expect(parsedAs("January 5, 2024, 10:30")).toBe("2024-01-05-10-30");
    expect(parsedAs("December 31, 2023 23:59")).toBe("2023-12-31-23-59");
  });

  it("accepts abbreviated months with or without a period", () => {
    expect(parsedAs("Jan. 5, 2024, 10:30")).toBe("2024-01-05-10-30");
    expect(parsedAs("Sept. 14, 2023, 8:05")).toBe("2023-09-14-08-05");
    expect(parsedAs("Oct 2, 2022, 7:00")).toBe("2022-10-02-07-00");
  });

  it("converts 12-hour times", () => {
    expect(parsedAs("March 3, 2021, 10:30 a.m.")).toBe("2021-03-03-10-30");
    expect(parsedAs("March 3, 2021, 4:15 p.m.")).toBe("2021-03-03-16-15");
    expect(parsedAs("March 3, 2021, 12:10 AM")).toBe("2021-03-03-00-10");
    expect(parsedAs("March 3, 2021, 12:10 pm")).toBe("2021-03-03-12-10");
    expect(parsedAs("March 3, 2021, 9 p.m.")).toBe("2021-03-03-21-00");
  });

  it("understands noon and midnight", () => {
    expect(parsedAs("June 1, 2020, noon")).toBe("2020-06-01-12-00");
    expect(parsedAs("June 1, 2020, midnight")).toBe("2020-06-01-00-00");
  });

  it("rejects out-of-range values", () => {
    expect(parseLastChange("February 30, 2023, 10:00")).toBeUndefined();
    expect(parseLastChange("April 31, 2023, 10:00")).toBeUndefined();
    expect(parseLastChange("April 3, 2023, 24:00")).toBeUndefined();
    expect(parseLastChange("April 3, 2023, 10:60")).toBeUndefined();
    expect(parseLastChange("April 3, 2023, 13:00 p.m.")).toBeUndefined();
  });

  it("rejects text in other shapes", () => {
    expect(parseLastChange("")).toBeUndefined();
    expect(parseLastChange("2024-01-05 10:30")).toBeUndefined();
    expect(parseLastChange("Smarch 5, 2024, 10:30")).toBeUndefined();
    expect(parseLastChange("January 5, 2024")).toBeUndefined();
    expect(parseLastChange("unknown")).toBeUndefined();
  });

  it("accepts a leap day only in leap years", () => {
    expect(parsedAs("February 29, 2024, 6:45")).toBe("2024-02-29-06-45");
    expect(parseLastChange("February 29, 2023, 6:45")).toBeUndefined();
  });
});

describe("formatLastChange", () => {
  it("zero-pads every component", () => {
    expect(formatLastChange(new Date(Date.UTC(2019, 2, 7, 4, 9)))).toBe("2019-03-07-04-09");
  });
});
