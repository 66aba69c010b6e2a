import { describe, expect, it, vi, beforeEach, afterEach } from "vitest";

import { TimerManager } from "../src/core/TimerManager";

describe("TimerManager", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("schedule", () => {
    it("fires callback after delay", () => {
      const tm = new TimerManager();
      const cb = vi.fn();
      tm.schedule("advance", cb, 1000);

      vi.advanceTimersByTime(999);
      expect(cb).not.toHaveBeenCalled();
      vi.advanceTimersByTime(1);
      expect(cb).toHaveBeenCalledTimes(1);
      expect(tm.cancel("advance")).toBe(false);
    });

    it("replaces a pending timer with the same label", () => {
      const tm = new TimerManager();
      const first = vi.fn();
      const second = vi.fn();

      tm.schedule("advance", first, 4000);
      tm.schedule("advance", second, 0);

      vi.advanceTimersByTime(5000);
      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
    });

    it("keeps a timer the callback rescheduled under its own label", () => {
      const tm = new TimerManager();
      let fired = 0;
      const tick = (): void => {
        fired++;
        if (fired < 3) tm.schedule("advance", tick, 100);
      };

      tm.schedule("advance", tick, 100);
      vi.advanceTimersByTime(100);
      expect(fired).toBe(1);

      vi.advanceTimersByTime(200);
      expect(fired).toBe(3);
      expect(tm.cancel("advance")).toBe(false);
    });

    it("clamps negative delays to zero", () => {
      const tm = new TimerManager();
      const cb = vi.fn();
      tm.schedule("advance", cb, -50);

      vi.advanceTimersByTime(0);
      expect(cb).toHaveBeenCalledTimes(1);
    });

    it("isolates callback errors", () => {
      const tm = new TimerManager();
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      tm.schedule(
        "advance",
        () => {
          throw new Error("boom");
        },
        100
      );

      vi.advanceTimersByTime(100);
      expect(errorSpy).toHaveBeenCalledWith(
        "[TimerManager] Callback error (advance):",
        expect.any(Error)
      );
      expect(tm.cancel("advance")).toBe(false);
      errorSpy.mockRestore();
    });
  });

  describe("cancel", () => {
    it("prevents the callback and reports whether a timer was pending", () => {
      const tm = new TimerManager();
      const cb = vi.fn();
      tm.schedule("advance", cb, 1000);

      expect(tm.cancel("advance")).toBe(true);
      expect(tm.cancel("advance")).toBe(false);

      vi.advanceTimersByTime(2000);
      expect(cb).not.toHaveBeenCalled();
    });

    it("cancelAll clears every label", () => {
      const tm = new TimerManager();
      const cb = vi.fn();
      tm.schedule("a", cb, 100);
      tm.schedule("b", cb, 200);

      tm.cancelAll();
      vi.advanceTimersByTime(1000);
      expect(cb).not.toHaveBeenCalled();
      expect(tm.cancel("a")).toBe(false);
      expect(tm.cancel("b")).toBe(false);
    });
  });
});
