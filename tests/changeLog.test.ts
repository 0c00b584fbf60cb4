/**
 * Change log ordering, window queries and retention hook
 */

import { ChangeLog, ChangeRetentionPolicy } from "../src/core/vfs/changeLog";
import { ChangeOrderError } from "../src/core/errors";

describe("ChangeLog", () => {
  test("should return an empty window for an empty log", () => {
    expect(new ChangeLog().since(0)).toEqual([]);
  });

  test("should return the maximal suffix at or after the threshold", () => {
    const log = new ChangeLog();
    log.append(1, [["site", "a"]]);
    log.append(2, [["site", "b"], ["site", "c"]]);
    log.append(3, [["site", "d"]]);

    expect(log.since(2)).toEqual([
      { timestamp: 2, route: ["site", "b"] },
      { timestamp: 2, route: ["site", "c"] },
      { timestamp: 3, route: ["site", "d"] },
    ]);
    expect(log.since(2.5)).toEqual([{ timestamp: 3, route: ["site", "d"] }]);
    expect(log.since(0)).toHaveLength(4);
    expect(log.since(3.01)).toEqual([]);
  });

  test("should stop scanning at the first older entry", () => {
    // Out-of-order input is outside the contract; the scan only looks at the tail
    const log = new ChangeLog();
    log.append(5, [["site", "late"]]);
    log.append(1, [["site", "early"]]);
    log.append(6, [["site", "newest"]]);

    expect(log.since(4)).toEqual([{ timestamp: 6, route: ["site", "newest"] }]);
  });

  test("should copy routes on append", () => {
    const log = new ChangeLog();
    const route = ["site", "a"];
    log.append(1, [route]);
    route.push("mutated");
    expect(log.entries[0].route).toEqual(["site", "a"]);
  });

  test("should accept equal and older timestamps unless ordering is enforced", () => {
    const log = new ChangeLog();
    log.append(2, [["site", "a"]]);
    expect(() => log.append(1, [["site", "b"]])).not.toThrow();
    expect(log.length).toBe(2);
  });

  test("should reject older timestamps when ordering is enforced", () => {
    const log = new ChangeLog({ enforceMonotonicTimestamps: true });
    log.append(2, [["site", "a"]]);
    log.append(2, [["site", "b"]]);
    expect(() => log.append(1.5, [["site", "c"]])).toThrow(ChangeOrderError);
    expect(log.length).toBe(2);
    expect(log.latestTimestamp()).toBe(2);
  });

  test("should run the retention policy after appends", () => {
    const keepLastTwo: ChangeRetentionPolicy = {
      apply(history) {
        if (history.length > 2) history.splice(0, history.length - 2);
      },
    };
    const log = new ChangeLog({ retention: keepLastTwo });
    log.append(1, [["a"]]);
    log.append(2, [["b"]]);
    log.append(3, [["c"]]);

    expect(log.entries.map((c) => c.route[0])).toEqual(["b", "c"]);
  });

  test("should not run the retention policy for empty appends", () => {
    const apply = jest.fn();
    const log = new ChangeLog({ retention: { apply } });
    log.append(1, []);
    expect(apply).not.toHaveBeenCalled();
  });
});
