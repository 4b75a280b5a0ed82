import { describe, it, expect } from "vitest";
import { FifoQueue } from "./fifo-queue.js";

describe("FifoQueue", () => {
  it("returns items in the order they were pushed", () => {
    const queue = new FifoQueue<string>();
    queue.push("a");
    queue.push("b");
    queue.push("c");

    expect(queue.shift()).toBe("a");
    queue.push("d");
    expect(queue.size).toBe(3);
    expect(queue.shift()).toBe("b");
    expect(queue.shift()).toBe("c");
    expect(queue.shift()).toBe("d");
  });

  it("returns undefined once empty", () => {
    const queue = new FifoQueue<number>();

    expect(queue.size).toBe(0);
    expect(queue.shift()).toBeUndefined();
    queue.push(1);
    expect(queue.size).toBe(1);
    expect(queue.shift()).toBe(1);
    expect(queue.shift()).toBeUndefined();
    expect(queue.size).toBe(0);
  });

  it("keeps its order across compaction", () => {
    const queue = new FifoQueue<number>();
    for (let i = 0; i < 3000; i++) queue.push(i);

    for (let i = 0; i < 2000; i++) {
      expect(queue.shift()).toBe(i);
    }
    queue.push(3000);

    expect(queue.size).toBe(1001);
    for (let i = 2000; i <= 3000; i++) {
      expect(queue.shift()).toBe(i);
    }
    expect(queue.shift()).toBeUndefined();
  });
});
