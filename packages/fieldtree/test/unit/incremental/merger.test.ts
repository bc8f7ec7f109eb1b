import gql from "graphql-tag";
import { createIncrementalMerger } from "@/src/incremental";
import {
  DuplicatePatchError,
  IncompleteDeliveryError,
  MissingRequiredFieldError,
  ScalarCoercionError,
  UnresolvablePatchPathError,
} from "@/src/core/errors";
import { createTestTree, operations, patchesOf } from "@/test/helpers";

const twoComputers = {
  computers: [
    { id: "c1", __typename: "Computer" },
    { id: "c2", __typename: "Computer" },
  ],
};

describe("createIncrementalMerger", () => {
  describe("base payload", () => {
    it("starts pending with the deferred labels", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      expect(merger.state).toBe("pending");
      expect(merger.isComplete()).toBe(false);
      expect(merger.pendingLabels()).toEqual(["specs"]);
      expect(merger.currentResult()).toEqual(twoComputers);
    });

    it("is complete when nothing is deferred", () => {
      const merger = createIncrementalMerger(createTestTree(operations.COMPUTERS_QUERY), {
        computers: [{ id: "c1", cpu: "M1", __typename: "Computer" }],
      });

      expect(merger.state).toBe("complete");
      expect(merger.pendingLabels()).toEqual([]);
    });

    it("decodes fields eagerly when the deferral is switched off", () => {
      const tree = createTestTree(gql`
        query Q($later: Boolean!) {
          computers {
            id
            ... @defer(label: "specs", if: $later) {
              cpu
            }
          }
        }
      `, { addTypename: false });

      const merger = createIncrementalMerger(tree, { computers: [{ id: "c1", cpu: "M1" }] }, { variables: { later: false } });

      expect(merger.isComplete()).toBe(true);
      expect(merger.currentResult()).toEqual({ computers: [{ id: "c1", cpu: "M1" }] });
    });

    it("drops deferrals under a position nulled by an error", () => {
      const merger = createIncrementalMerger(createTestTree(operations.NESTED_DEFER_QUERY), {
        computer: { id: 1.5, __typename: "Computer" },
      });

      expect(merger.currentResult()).toEqual({ computer: null });
      expect(merger.errors).toHaveLength(1);
      expect(merger.state).toBe("complete");
    });
  });

  describe("apply", () => {
    it("grafts a single deferred field addressed by its own path", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SCREEN_QUERY), {
        computers: [{ id: "c1", __typename: "Computer" }],
      });

      expect(merger.pendingLabels()).toEqual(["defer:0"]);

      merger.apply({
        path: ["computers", 0, "screen"],
        data: { resolution: "4K", __typename: "Screen" },
        isFinal: true,
      });

      const result = merger.currentResult();
      expect(result).toEqual({
        computers: [{ id: "c1", screen: { resolution: "4K", __typename: "Screen" }, __typename: "Computer" }],
      });
      expect(JSON.stringify(result)).toBe(
        '{"computers":[{"id":"c1","screen":{"resolution":"4K","__typename":"Screen"},"__typename":"Computer"}]}',
      );
      expect(merger.state).toBe("complete");
    });

    it("grafts a labeled group addressed by the owning object", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      merger.apply({ path: ["computers", 0], label: "specs", data: { year: 2020, cpu: "M1" } });

      expect(merger.state).toBe("pending");
      expect(merger.pendingLabels()).toEqual(["specs"]);

      merger.apply({ path: ["computers", 1], label: "specs", data: { cpu: "M2", year: 2022 }, isFinal: true });

      expect(merger.state).toBe("complete");
      expect(JSON.stringify(merger.currentResult())).toBe(
        '{"computers":[' +
          '{"id":"c1","cpu":"M1","year":2020,"__typename":"Computer"},' +
          '{"id":"c2","cpu":"M2","year":2022,"__typename":"Computer"}]}',
      );
    });

    it("throws DuplicatePatch for a path that is no longer pending", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);
      const patch = { path: ["computers", 0], label: "specs", data: { cpu: "M1", year: 2020 } };

      merger.apply(patch);

      expect(() => merger.apply(patch)).toThrow(DuplicatePatchError);
      expect(() => merger.apply(patch)).toThrow('Nothing is pending for patch "specs" at computers.0');
    });

    it("throws UnresolvablePatchPath for a path outside the result", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      expect(() => merger.apply({ path: ["computers", 5], label: "specs", data: {} })).toThrow(UnresolvablePatchPathError);
      expect(() => merger.apply({ path: ["computers", 5], label: "specs", data: {} })).toThrow(
        "Patch path computers.5 does not exist in the result",
      );
    });

    it("keeps the deferral pending when patch data cannot be decoded", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      expect(() => merger.apply({ path: ["computers", 0], label: "specs", data: { cpu: "M1" } })).toThrow(
        MissingRequiredFieldError,
      );
      expect(merger.currentResult()).toEqual(twoComputers);

      merger.apply({ path: ["computers", 0], label: "specs", data: { cpu: "M1", year: 2020 } });
      expect(merger.currentResult()?.computers).toEqual([
        { id: "c1", cpu: "M1", year: 2020, __typename: "Computer" },
        { id: "c2", __typename: "Computer" },
      ]);
    });

    it("fails a final patch that leaves deferrals pending", () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      expect(() => {
        merger.apply({ path: ["computers", 0], label: "specs", data: { cpu: "M1", year: 2020 }, isFinal: true });
      }).toThrow(IncompleteDeliveryError);

      expect(merger.state).toBe("incomplete");
      expect(merger.currentResult()?.computers).toEqual([
        { id: "c1", cpu: "M1", year: 2020, __typename: "Computer" },
        { id: "c2", __typename: "Computer" },
      ]);
    });

    it("discovers nested deferrals as their parents arrive", () => {
      const merger = createIncrementalMerger(createTestTree(operations.NESTED_DEFER_QUERY), {
        computer: { id: "c1", __typename: "Computer" },
      });

      expect(merger.pendingLabels()).toEqual(["outer"]);

      merger.apply({ path: ["computer"], label: "outer", data: { screen: { size: 13, __typename: "Screen" } } });

      expect(merger.pendingLabels()).toEqual(["inner"]);

      merger.apply({ path: ["computer", "screen"], label: "inner", data: { resolution: "4K" }, isFinal: true });

      expect(merger.state).toBe("complete");
      expect(JSON.stringify(merger.currentResult())).toBe(
        '{"computer":{"id":"c1","screen":{"size":13,"resolution":"4K","__typename":"Screen"},"__typename":"Computer"}}',
      );
    });

    it("holds a deferral nested in another until that one is grafted", () => {
      const tree = createTestTree(gql`
        query Q {
          computer(id: "c1") {
            id
            ... @defer(label: "outer") {
              cpu
              ... @defer(label: "inner") {
                year
              }
            }
          }
        }
      `);
      const merger = createIncrementalMerger(tree, { computer: { id: "c1", __typename: "Computer" } });

      expect(merger.pendingLabels()).toEqual(["outer"]);
      expect(() => merger.apply({ path: ["computer"], label: "inner", data: { year: 2020 } })).toThrow(DuplicatePatchError);
      expect(merger.currentResult()).toEqual({ computer: { id: "c1", __typename: "Computer" } });

      merger.apply({ path: ["computer"], label: "outer", data: { cpu: "M1" } });

      expect(merger.pendingLabels()).toEqual(["inner"]);

      merger.apply({ path: ["computer"], label: "inner", data: { year: 2020 }, isFinal: true });

      expect(merger.state).toBe("complete");
      expect(JSON.stringify(merger.currentResult())).toBe(
        '{"computer":{"id":"c1","cpu":"M1","year":2020,"__typename":"Computer"}}',
      );
    });

    it("records errors at nullable positions inside a patch", () => {
      const merger = createIncrementalMerger(createTestTree(operations.NESTED_DEFER_QUERY), {
        computer: { id: "c1", __typename: "Computer" },
      });

      merger.apply({ path: ["computer"], label: "outer", data: { screen: { size: "big", __typename: "Screen" } } });

      expect(merger.errors).toHaveLength(1);
      expect(merger.errors[0]).toBeInstanceOf(ScalarCoercionError);
      expect(merger.errors[0].path).toEqual(["computer", "screen", "size"]);
      expect(merger.pendingLabels()).toEqual(["inner"]);
    });
  });

  describe("consume", () => {
    it("applies patches in order until the final one", async () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      await merger.consume(patchesOf([
        { path: ["computers", 0], label: "specs", data: { cpu: "M1", year: 2020 } },
        { path: ["computers", 1], label: "specs", data: { cpu: "M2", year: 2022 }, isFinal: true },
      ]));

      expect(merger.state).toBe("complete");
    });

    it("stops when the signal is aborted", async () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);
      const controller = new AbortController();
      controller.abort();

      await merger.consume(
        patchesOf([{ path: ["computers", 0], label: "specs", data: { cpu: "M1", year: 2020 } }]),
        { signal: controller.signal },
      );

      expect(merger.state).toBe("pending");
      expect(merger.currentResult()).toEqual(twoComputers);
    });

    it("rejects with the error of a failing patch", async () => {
      const merger = createIncrementalMerger(createTestTree(operations.DEFERRED_SPECS_QUERY), twoComputers);

      await expect(
        merger.consume(patchesOf([{ path: ["computers", 9], label: "specs", data: {} }])),
      ).rejects.toThrow(UnresolvablePatchPathError);
    });
  });
});
