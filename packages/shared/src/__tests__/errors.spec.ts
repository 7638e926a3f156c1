import { describe, it, expect } from "vitest";
import {
  PluginConfigError,
  StoreCommandError,
  isPluginConfigError,
  isStoreCommandError,
} from "../errors.js";

describe("StoreCommandError", () => {
  it("includes exit code and stderr", () => {
    const error = new StoreCommandError("gopass ls", 1, "store not initialized");
    expect(error.message).toBe("gopass ls exited with code 1: store not initialized");
    expect(error.name).toBe("StoreCommandError");
    expect(isStoreCommandError(error)).toBe(true);
  });

  it("reports a missing binary", () => {
    expect(new StoreCommandError("gopass", -1, "").message).toBe("gopass: command not found");
  });
});

describe("PluginConfigError", () => {
  it("carries the missing field", () => {
    const error = new PluginConfigError("onSearch", "config onSearch callback is required");
    expect(error.field).toBe("onSearch");
    expect(isPluginConfigError(error)).toBe(true);
    expect(isPluginConfigError(new Error("x"))).toBe(false);
  });
});
