import { describe, expect, it } from "vitest";
import { NULL_INDEX, SlotArena } from "../slot_arena";

type Item = { name: string };

describe("SlotArena", () => {
  //=========================================================
  // insert / get
  //=========================================================

  it("never issues index 0", () => {
    const arena = new SlotArena<Item>();
    expect(arena.insert({ name: "a" })).toBe(1);
    expect(arena.has(NULL_INDEX)).toBe(false);
    expect(arena.get(NULL_INDEX)).toBeUndefined();
  });

  it("issues increasing indices while nothing is free", () => {
    const arena = new SlotArena<Item>();
    expect(arena.insert({ name: "a" })).toBe(1);
    expect(arena.insert({ name: "b" })).toBe(2);
    expect(arena.insert({ name: "c" })).toBe(3);
    expect(arena.size).toBe(3);
    expect(arena.high_water).toBe(3);
  });

  it("get returns the stored value by reference", () => {
    const arena = new SlotArena<Item>();
    const item = { name: "a" };
    const index = arena.insert(item);
    expect(arena.get(index)).toBe(item);
  });

  it("get and has are false out of range", () => {
    const arena = new SlotArena<Item>();
    arena.insert({ name: "a" });
    expect(arena.has(2)).toBe(false);
    expect(arena.get(2)).toBeUndefined();
    expect(arena.has(-1)).toBe(false);
  });

  //=========================================================
  // remove / reuse
  //=========================================================

  it("remove clears the slot", () => {
    const arena = new SlotArena<Item>();
    const index = arena.insert({ name: "a" });
    expect(arena.remove(index)).toBe(true);
    expect(arena.has(index)).toBe(false);
    expect(arena.get(index)).toBeUndefined();
    expect(arena.size).toBe(0);
  });

  it("remove of a free or unknown index returns false", () => {
    const arena = new SlotArena<Item>();
    const index = arena.insert({ name: "a" });
    arena.remove(index);
    expect(arena.remove(index)).toBe(false);
    expect(arena.remove(99)).toBe(false);
    expect(arena.remove(NULL_INDEX)).toBe(false);
  });

  it("reuses freed indices oldest-first", () => {
    const arena = new SlotArena<Item>();
    for (let i = 0; i < 4; i++) arena.insert({ name: `e${i}` });
    arena.remove(3);
    arena.remove(1);
    expect(arena.free_count).toBe(2);
    expect(arena.insert({ name: "x" })).toBe(3);
    expect(arena.insert({ name: "y" })).toBe(1);
    expect(arena.insert({ name: "z" })).toBe(5);
    expect(arena.free_count).toBe(0);
  });

  it("a reused index holds the new value", () => {
    const arena = new SlotArena<Item>();
    const index = arena.insert({ name: "old" });
    arena.remove(index);
    const reused = arena.insert({ name: "new" });
    expect(reused).toBe(index);
    expect(arena.get(reused)).toEqual({ name: "new" });
  });

  it("keeps reuse order across a long churn", () => {
    const arena = new SlotArena<Item>();
    for (let i = 1; i <= 100; i++) arena.insert({ name: `e${i}` });
    for (let i = 1; i <= 100; i++) arena.remove(i);
    for (let i = 1; i <= 100; i++) {
      expect(arena.insert({ name: `r${i}` })).toBe(i);
    }
    expect(arena.high_water).toBe(100);
    expect(arena.size).toBe(100);
  });

  //=========================================================
  // clear
  //=========================================================

  it("clear resets indices and the free queue", () => {
    const arena = new SlotArena<Item>();
    arena.insert({ name: "a" });
    arena.insert({ name: "b" });
    arena.remove(1);
    arena.clear();
    expect(arena.size).toBe(0);
    expect(arena.free_count).toBe(0);
    expect(arena.high_water).toBe(0);
    expect(arena.insert({ name: "c" })).toBe(1);
  });
});
