import { describe, expect, it } from "vitest";
import { WorkQueue } from "../work-queue.js";

describe("WorkQueue", () => {
  it("hands items out in FIFO order", () => {
    const queue = new WorkQueue<string>();
    queue.enqueue("a");
    queue.enqueue("b");

    expect(queue.size).toBe(2);
    expect(queue.tryDequeue()).toBe("a");
    expect(queue.tryDequeue()).toBe("b");
    expect(queue.tryDequeue()).toBeUndefined();
  });

  it("reports drained only after completion and exhaustion", () => {
    const queue = new WorkQueue<number>();
    queue.enqueue(1);
    expect(queue.isDrained).toBe(false);

    queue.complete();
    expect(queue.isCompleted).toBe(true);
    expect(queue.isDrained).toBe(false);

    queue.tryDequeue();
    expect(queue.isDrained).toBe(true);
  });

  it("rejects items after completion", () => {
    const queue = new WorkQueue<number>();
    queue.complete();
    queue.complete();
    expect(() => queue.enqueue(1)).toThrow("Cannot enqueue after the producer completed");
  });

  it("keeps order across internal compaction", () => {
    const queue = new WorkQueue<number>();
    for (let i = 0; i < 5000; i++) queue.enqueue(i);

    const seen: number[] = [];
    for (let i = 0; i < 3000; i++) seen.push(queue.tryDequeue() ?? -1);
    for (let i = 5000; i < 5010; i++) queue.enqueue(i);

    let next = queue.tryDequeue();
    while (next !== undefined) {
      seen.push(next);
      next = queue.tryDequeue();
    }

    expect(seen).toEqual(Array.from({ length: 5010 }, (_, i) => i));
    expect(queue.size).toBe(0);
  });
});
