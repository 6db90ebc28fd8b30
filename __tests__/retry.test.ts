import { retryAsync } from "../src/utils/retry";
import { createMockLogger } from "./helpers";

describe("retryAsync", () => {
  const logger = createMockLogger();

  it("returns the first success", async () => {
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error("first"))
      .mockResolvedValueOnce("ok");

    await expect(retryAsync(fn, { maxRetries: 3, logger })).resolves.toBe("ok");
    expect(fn.mock.calls).toEqual([[0], [1]]);
  });

  it("rethrows the last error", async () => {
    const fn = jest
      .fn<Promise<string>, [number]>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(retryAsync(fn, { maxRetries: 2, logger })).rejects.toThrow("second");
  });

  it("uses the fallback once retries are exhausted", async () => {
    const fallback = jest.fn(async () => "fallback");
    const fn = jest.fn<Promise<string>, [number]>().mockRejectedValue(new Error("down"));

    await expect(retryAsync(fn, { maxRetries: 2, fallback, logger })).resolves.toBe(
      "fallback",
    );
    expect(fallback).toHaveBeenCalledWith(new Error("down"), 1);
  });

  it("runs at least once", async () => {
    const fn = jest.fn<Promise<number>, [number]>().mockResolvedValue(7);
    await expect(retryAsync(fn, { maxRetries: 0, logger })).resolves.toBe(7);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
