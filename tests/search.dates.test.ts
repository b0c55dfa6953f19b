import { describe, it } from "mocha";
import { expect } from "chai";

import { parseUpstreamDate } from "../server/search/dates";

describe("search/parseUpstreamDate", () => {
  it("accepts the date formats the portal uses", () => {
    const inputs = ["2023-03-15", "2023-03-15T10:30:00+05:30", "15/03/2023", "15-03-2023", "15.03.2023", "2023/03/15", "15 Mar 2023", "15-Mar-2023", "Mar 15, 2023", "15 March 2023"];

    expect(inputs.map((input) => parseUpstreamDate(input))).to.deep.equal(
      inputs.map(() => ({ status: "parsed", date: "2023-03-15" })),
    );
  });

  it("reads epoch milliseconds as a UTC calendar day", () => {
    expect(parseUpstreamDate(1678838400000)).to.deep.equal({ status: "parsed", date: "2023-03-15" });
    expect(parseUpstreamDate("1678838400000")).to.deep.equal({ status: "parsed", date: "2023-03-15" });
  });

  it("treats blanks and placeholders as empty", () => {
    expect([null, undefined, "", "  ", "-", "NA", "n/a"].map((value) => parseUpstreamDate(value).status)).to.deep.equal([
      "empty",
      "empty",
      "empty",
      "empty",
      "empty",
      "empty",
      "empty",
    ]);
  });

  it("rejects impossible or out-of-range dates", () => {
    expect(parseUpstreamDate("2023-02-30")).to.deep.equal({ status: "invalid", raw: "2023-02-30" });
    expect(parseUpstreamDate("31/12/1850")).to.deep.equal({ status: "invalid", raw: "31/12/1850" });
    expect(parseUpstreamDate(2023)).to.deep.equal({ status: "invalid", raw: "2023" });
  });
});
