import { describe, expect, it } from "vitest";
import { formatTable } from "./table";

describe("formatTable", () => {
  it("pads cells to the widest value and marks alignment", () => {
    const lines = formatTable(
      [
        { header: "scheme_ID", align: "left" },
        { header: "CT_Count", align: "right" },
      ],
      [
        ["Abaumannii", "1234"],
        ["Saureus", "7"],
      ],
    );

    expect(lines).toEqual([
      "|scheme_ID |CT_Count|",
      "|:---------|-------:|",
      "|Abaumannii|    1234|",
      "|Saureus   |       7|",
    ]);
  });

  it("renders only the header and alignment rows when there is no data", () => {
    expect(formatTable([{ header: "Name", align: "left" }], [])).toEqual(["|Name|", "|:---|"]);
  });
});
