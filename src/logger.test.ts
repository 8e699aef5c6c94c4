import { describe, it, expect, vi, afterEach } from "vitest";
import { logEvent, sanitizeFields } from "./logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("keeps only allow-listed scalar fields", () => {
    expect(
      sanitizeFields({
        storeId: "vs_1",
        apiKey: "test-secret",
        httpStatus: 200,
        fileId: null,
        code: { nested: true },
      }),
    ).toEqual({ storeId: "vs_1", httpStatus: 200, fileId: null });
  });

  it("writes one JSON line per event to the matching console method", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    logEvent("info", "store_created", { storeId: "vs_1", authorization: "Bearer test-secret" });
    logEvent("error", "store_delete_halted", { storeId: "vs_1", reason: "delete_file" });

    expect(log).toHaveBeenCalledWith('{"level":"info","name":"store_created","storeId":"vs_1"}');
    expect(error).toHaveBeenCalledWith(
      '{"level":"error","name":"store_delete_halted","storeId":"vs_1","reason":"delete_file"}',
    );
  });
});
