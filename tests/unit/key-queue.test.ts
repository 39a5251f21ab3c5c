import { describe, it, expect, afterEach, vi } from "vitest";
import type { KeyEvent } from "@shared/types";
import { KeyQueue } from "../../src/main/runtime/key-queue";

const a: KeyEvent = { type: "edit", edit: { op: "insert", text: "a" } };
const b: KeyEvent = { type: "edit", edit: { op: "insert", text: "b" } };
const cancel: KeyEvent = { type: "cancel" };

describe("KeyQueue", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("returns queued events in order", async () => {
    const queue = new KeyQueue();
    queue.push(a);
    queue.push(b);

    await expect(queue.poll(100)).resolves.toBe(a);
    await expect(queue.poll(100)).resolves.toBe(b);
  });

  it("resolves a waiting poll as soon as an event is pushed", async () => {
    vi.useFakeTimers();
    const queue = new KeyQueue();

    const pending = queue.poll(100);
    queue.push(cancel);

    await expect(pending).resolves.toBe(cancel);
  });

  it("hands a pushed event to the waiting poll only", async () => {
    vi.useFakeTimers();
    const queue = new KeyQueue();

    const pending = queue.poll(100);
    queue.push(a);
    await pending;

    const next = queue.poll(50);
    await vi.advanceTimersByTimeAsync(50);
    await expect(next).resolves.toBeNull();
  });

  it("resolves null when nothing arrives before the timeout", async () => {
    vi.useFakeTimers();
    const queue = new KeyQueue();

    const pending = queue.poll(100);
    await vi.advanceTimersByTimeAsync(100);

    await expect(pending).resolves.toBeNull();
  });

  it("queues events pushed after a poll timed out", async () => {
    vi.useFakeTimers();
    const queue = new KeyQueue();

    const pending = queue.poll(50);
    await vi.advanceTimersByTimeAsync(50);
    await pending;
    queue.push(a);

    await expect(queue.poll(50)).resolves.toBe(a);
  });

  it("rejects a second concurrent poll", async () => {
    vi.useFakeTimers();
    const queue = new KeyQueue();

    const first = queue.poll(100);
    await expect(queue.poll(100)).rejects.toThrow("KeyQueue supports a single pending poll.");

    await vi.advanceTimersByTimeAsync(100);
    await expect(first).resolves.toBeNull();
  });
});
