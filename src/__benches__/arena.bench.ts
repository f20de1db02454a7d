import { bench, describe } from "vitest";
import { Arena } from "../arena";
import type { Index } from "../handle";

const TIERS = [1_000, 10_000, 100_000] as const;

// ============================================================
// Insert (fresh) — append path
// ============================================================

describe("insert (fresh)", () => {
  for (const N of TIERS) {
    bench(`insert ${N.toLocaleString()} values`, () => {
      const arena = new Arena<number>();
      for (let i = 0; i < N; i++) arena.insert(i);
    });
  }
});

// ============================================================
// Insert (recycled) — free-list path
// ============================================================

describe("insert (recycled)", () => {
  for (const N of TIERS) {
    let arena = new Arena<number>();
    bench(
      `insert ${N.toLocaleString()} recycled values`,
      () => {
        for (let i = 0; i < N; i++) arena.insert(i);
      },
      {
        setup: () => {
          arena = new Arena<number>();
          const ids: Index[] = [];
          for (let i = 0; i < N; i++) ids.push(arena.insert(i));
          for (let i = 0; i < N; i++) arena.remove(ids[i]);
        },
      },
    );
  }
});

// ============================================================
// Lookup — live and stale handles
// ============================================================

describe("get", () => {
  for (const N of TIERS) {
    const arena = new Arena<number>();
    const live: Index[] = [];
    const stale: Index[] = [];
    for (let i = 0; i < N; i++) {
      const idx = arena.insert(i);
      stale.push(idx);
      arena.remove(idx);
      live.push(arena.insert(i));
    }

    bench(`get ${N.toLocaleString()} live handles`, () => {
      for (let i = 0; i < N; i++) arena.get(live[i]);
    });

    bench(`get ${N.toLocaleString()} stale handles`, () => {
      for (let i = 0; i < N; i++) arena.get(stale[i]);
    });
  }
});

// ============================================================
// Iteration over a half-empty arena
// ============================================================

describe("iterate", () => {
  for (const N of TIERS) {
    const arena = new Arena<number>();
    const ids: Index[] = [];
    for (let i = 0; i < N; i++) ids.push(arena.insert(i));
    for (let i = 0; i < N; i += 2) arena.remove(ids[i]);

    bench(`sum ${N.toLocaleString()} slots`, () => {
      let sum = 0;
      for (const v of arena.values()) sum += v;
    });
  }
});
