import { Logger } from "../../models/Logger";
import type { ILog } from "../../models/Logger";
import { LogPrinter } from "../../models/LogPrinter";

describe("Logger", () => {
  let out: string[];
  let err: string[];

  beforeEach(() => {
    out = [];
    err = [];
    LogPrinter.setWriters({
      log: (line) => out.push(line),
      error: (line) => err.push(line),
    });
  });

  afterEach(() => {
    LogPrinter.resetWriters();
  });

  const createLogger = () =>
    new Logger({ printThreshold: "info", printStrategy: "plain", useColors: false });

  it("prints at or above the threshold", () => {
    const logger = createLogger();
    logger.debug("hidden");
    logger.info("hello", { source: "unit" });

    expect(out).toEqual(["INFO [unit] hello"]);
  });

  it("routes warnings and errors to the error writer", () => {
    const logger = createLogger();
    logger.warn("careful");
    logger.critical("down");

    expect(out).toEqual([]);
    expect(err).toEqual(["WARN careful", "CRITICAL down"]);
  });

  it("binds source and context with with()", () => {
    const child = createLogger().with({
      source: "child",
      additionalContext: { requestId: 1 },
    });
    child.info("m");

    expect(out).toEqual([
      "INFO [child] m",
      "    ╰─ context:",
      "       {",
      '         "requestId": 1',
      "       }",
      "",
    ]);
  });

  it("lets a log override the bound source", () => {
    createLogger().with({ source: "child" }).info("m", { source: "override" });
    expect(out).toEqual(["INFO [override] m"]);
  });

  it("prints data records under their label", () => {
    createLogger().info("with data", { data: { size: 2 } });
    expect(out).toEqual([
      "INFO with data",
      "    ╰─ data:",
      "       {",
      '         "size": 2',
      "       }",
      "",
    ]);
  });

  it("notifies listeners registered on the root from children", () => {
    const logger = Logger.silent();
    const seen: ILog[] = [];
    logger.onLog((log) => seen.push(log));

    logger.with({ source: "nested" }).trace("quiet", { data: { a: 1 } });

    expect(out).toEqual([]);
    expect(seen).toHaveLength(1);
    expect(seen[0].level).toBe("trace");
    expect(seen[0].source).toBe("nested");
    expect(seen[0].message).toBe("quiet");
    expect(seen[0].data).toEqual({ a: 1 });
  });

  it("extracts error details", () => {
    const logger = Logger.silent();
    const seen: ILog[] = [];
    logger.onLog((log) => seen.push(log));

    logger.error("failed", { error: new TypeError("bad") });
    logger.error("failed", { error: "plain" });

    expect(seen[0].error).toMatchObject({ name: "TypeError", message: "bad" });
    expect(seen[1].error).toEqual({ name: "UnknownError", message: "plain" });
  });

  it("reports failing listeners without breaking the caller", () => {
    const logger = createLogger();
    logger.onLog(() => {
      throw new Error("listener broke");
    });

    expect(() => logger.info("still works")).not.toThrow();
    expect(err[0]).toBe("ERROR Error in log listener");
    expect(err[1]).toBe("    ╰─ Error: listener broke");
    expect(out[0]).toBe("INFO still works");
  });

  it("orders severities", () => {
    expect(Logger.Severity.trace).toBeLessThan(Logger.Severity.debug);
    expect(Logger.Severity.error).toBeLessThan(Logger.Severity.critical);
  });
});
