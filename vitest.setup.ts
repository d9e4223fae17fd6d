/**
 * Vitest Global Setup
 *
 * Keeps fake timers from leaking between tests.
 */
import { afterEach, vi } from "vitest";

afterEach(() => {
  vi.useRealTimers();
});
