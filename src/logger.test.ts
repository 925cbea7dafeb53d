import { afterEach, describe, it, expect, vi } from "vitest";
import { createLogger } from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes the level and component", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    createLogger("store").warn("Dataset is large", { feasts: 400 });
    expect(warn).toHaveBeenCalledWith("[WARN] store: Dataset is large", { feasts: 400 });
  });

  it("omits extra when none is given", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("store").error("Failed");
    expect(error).toHaveBeenCalledWith("[ERROR] store: Failed");
  });

  it("drops entries below the configured level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    const logger = createLogger("store", "warn");
    logger.debug("hidden");
    logger.info("hidden");
    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it("writes debug entries at debug level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    createLogger("store", "debug").debug("Loaded");
    expect(debug).toHaveBeenCalledWith("[DEBUG] store: Loaded");
  });

  it("writes nothing when silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    createLogger("store", "silent").error("Failed");
    expect(error).not.toHaveBeenCalled();
  });
});
