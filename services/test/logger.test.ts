import { afterEach, describe, expect, it, vi } from "vitest";

import { getEnv } from "@/lib/env";
import { logger } from "@/lib/logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("filters by the configured LOG_LEVEL", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logger.info("Hidden");
    logger.warn("Hidden too");
    logger.error("Scan failed", { file: "GL_FP_2025_01.xlsx", cause: new Error("boom") });

    expect(getEnv().LOG_LEVEL).toBe("error");
    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(1);

    const entry: unknown = JSON.parse(String(error.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: "error",
      message: "Scan failed",
      file: "GL_FP_2025_01.xlsx",
      cause: { name: "Error", message: "boom" },
    });
  });
});
