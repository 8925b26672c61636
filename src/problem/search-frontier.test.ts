import { describe, it, expect } from "vitest";
import { isExplorationOrder, SearchFrontier } from "./search-frontier";

function drain<T>(frontier: SearchFrontier<T>): T[] {
  const items: T[] = [];
  let item = frontier.take();
  while (item !== undefined) {
    items.push(item);
    item = frontier.take();
  }
  return items;
}

describe("SearchFrontier", () => {
  it("should take the newest item first when depth-first", () => {
    const frontier = new SearchFrontier<number>("depth-first");
    frontier.push(1);
    frontier.push(2);
    frontier.push(3);
    expect(frontier.size).toBe(3);
    expect(drain(frontier)).toEqual([3, 2, 1]);
    expect(frontier.isEmpty()).toBe(true);
  });

  it("should take the oldest item first when breadth-first", () => {
    const frontier = new SearchFrontier<number>("breadth-first");
    frontier.push(1);
    frontier.push(2);
    frontier.push(3);
    expect(drain(frontier)).toEqual([1, 2, 3]);
  });

  it("should return undefined once empty", () => {
    expect(new SearchFrontier<string>("depth-first").take()).toBeUndefined();
    expect(new SearchFrontier<string>("breadth-first").take()).toBeUndefined();
  });

  it("should interleave pushes and takes in queue order", () => {
    const frontier = new SearchFrontier<string>("breadth-first");
    frontier.push("a");
    frontier.push("b");
    expect(frontier.take()).toBe("a");
    frontier.push("c");
    expect(frontier.size).toBe(2);
    expect(drain(frontier)).toEqual(["b", "c"]);
  });

  it("should keep queue order across compaction", () => {
    const frontier = new SearchFrontier<number>("breadth-first");
    for (let i = 0; i < 3000; i++) frontier.push(i);
    for (let i = 0; i < 2000; i++) expect(frontier.take()).toBe(i);
    frontier.push(3000);
    expect(frontier.size).toBe(1001);
    expect(drain(frontier)).toEqual(Array.from({ length: 1001 }, (_, i) => 2000 + i));
  });

  it("should recognise exploration order names", () => {
    expect(isExplorationOrder("depth-first")).toBe(true);
    expect(isExplorationOrder("breadth-first")).toBe(true);
    expect(isExplorationOrder("random")).toBe(false);
  });
});
