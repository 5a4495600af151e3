import { afterEach, describe, expect, it, vi } from "vitest";

import { createConsoleLogger, createNoopLogger } from "../logger";

describe("logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes console output and passes context through", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = createConsoleLogger();

    logger.debug("Executed command", { command: "Split pane-1" });
    logger.warn("Rolled back");

    expect(debug).toHaveBeenCalledWith("[multisplit] Executed command", { command: "Split pane-1" });
    expect(warn).toHaveBeenCalledWith("[multisplit] Rolled back", {});
  });

  it("stays quiet when no-op", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    createNoopLogger().error("ignored");

    expect(error).not.toHaveBeenCalled();
  });
});
