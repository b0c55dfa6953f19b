import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { createLogger, formatTime } from "../server/log";

describe("log/createLogger", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("formats times on a 12-hour clock", () => {
    // ICU may separate the day period with a narrow no-break space.
    expect(formatTime(new Date(2024, 0, 5, 14, 7, 9))).to.match(/^2:07:09\sPM$/);
  });

  it("drops lines below the threshold and tags the source", () => {
    const info = sinon.stub(console, "log");
    const warn = sinon.stub(console, "warn");
    const error = sinon.stub(console, "error");
    const logger = createLogger("express", "warn").child("cache");

    logger.debug("hidden");
    logger.info("hidden too");
    logger.warn("degraded");
    logger.error("failed");

    expect(info.called).to.equal(false);
    expect(warn.calledOnce).to.equal(true);
    expect(String(warn.firstCall.args[0])).to.match(/^\d{1,2}:\d{2}:\d{2}\s[AP]M \[cache\] degraded$/);
    expect(String(error.firstCall.args[0])).to.match(/\[cache\] failed$/);
  });
});
