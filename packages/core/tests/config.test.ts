import { expect } from "chai";
import * as path from "path";
import { DEFAULT_BUILD_DIR, loadConfig } from "../src/config.js";
import { createConsoleLogger, silentLogger } from "../src/logger.js";

describe("configuration", () => {
  it("falls back to the default build directory", () => {
    expect(loadConfig({})).to.deep.equal({ buildDir: path.resolve(DEFAULT_BUILD_DIR), debug: false });
    expect(loadConfig({ ZK_BUILD_DIR: "   " }).buildDir).to.equal(path.resolve(DEFAULT_BUILD_DIR));
  });

  it("resolves ZK_BUILD_DIR against the working directory", () => {
    expect(loadConfig({ ZK_BUILD_DIR: "artifacts/zk" }).buildDir).to.equal(path.resolve("artifacts/zk"));
    expect(loadConfig({ ZK_BUILD_DIR: "/opt/zk" }).buildDir).to.equal(path.resolve("/opt/zk"));
  });

  it("treats ZK_DEBUG as off when unset, empty or 0", () => {
    expect(loadConfig({ ZK_DEBUG: "" }).debug).to.be.false;
    expect(loadConfig({ ZK_DEBUG: "0" }).debug).to.be.false;
    expect(loadConfig({ ZK_DEBUG: "1" }).debug).to.be.true;
    expect(loadConfig({ ZK_DEBUG: "true" }).debug).to.be.true;
  });
});

describe("loggers", () => {
  it("routes debug output only when enabled", () => {
    const original = console.debug;
    const lines: unknown[][] = [];
    console.debug = (...args: unknown[]) => {
      lines.push(args);
    };
    try {
      createConsoleLogger().debug("hidden");
      createConsoleLogger({ debug: true }).debug("shown", 1);
    } finally {
      console.debug = original;
    }
    expect(lines).to.deep.equal([["shown", 1]]);
  });

  it("discards everything when silent", () => {
    expect(() => {
      silentLogger.debug("x");
      silentLogger.info("x");
      silentLogger.warn("x");
      silentLogger.error("x");
    }).to.not.throw();
  });
});
