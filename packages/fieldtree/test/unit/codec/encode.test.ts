import { encodeResponse } from "@/src/codec/encode";
import {
  MissingRequiredFieldError,
  NonNullViolationError,
  ScalarCoercionError,
  UnhandledTypeConditionError,
} from "@/src/core/errors";
import { createTestTree, operations } from "@/test/helpers";

describe("encodeResponse", () => {
  it("writes keys in canonical order", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    const payload = encodeResponse(tree, {
      hero: { __typename: "Human", homePlanet: "Tatooine", name: "Luke" },
    });

    expect(JSON.stringify(payload)).toBe('{"hero":{"name":"Luke","homePlanet":"Tatooine","__typename":"Human"}}');
  });

  it("writes absent nullable fields as null", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    const payload = encodeResponse(tree, { hero: { __typename: "Droid", name: "R2" } });

    expect(payload).toEqual({ hero: { name: "R2", primaryFunction: null, __typename: "Droid" } });
  });

  it("skips absent deferred fields", () => {
    const tree = createTestTree(operations.DEFERRED_SPECS_QUERY);

    const payload = encodeResponse(tree, { computers: [{ id: "c1", __typename: "Computer" }] });

    expect(payload).toEqual({ computers: [{ id: "c1", __typename: "Computer" }] });
  });

  it("skips fields excluded by their conditions", () => {
    const tree = createTestTree(operations.COMPUTER_QUERY, { addTypename: false });

    const payload = encodeResponse(
      tree,
      { computer: { id: "c1", screen: { size: 13 } } },
      { variables: { id: "c1", withScreen: false } },
    );

    expect(payload).toEqual({ computer: { id: "c1" } });
  });

  it("throws MissingRequiredField for an absent non-null field", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY);

    expect(() => encodeResponse(tree, { computers: [{ id: "c1", __typename: "Computer" }] })).toThrow(
      MissingRequiredFieldError,
    );
  });

  it("throws NonNullViolation for null in a non-null position", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY);

    expect(() => encodeResponse(tree, { computers: null })).toThrow(NonNullViolationError);
    expect(() => encodeResponse(tree, { computers: null })).toThrow("Null value for non-null position computers");
  });

  it("throws UnhandledTypeCondition for a typename no fragment covers", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    expect(() => encodeResponse(tree, { hero: { __typename: "Starship" } })).toThrow(UnhandledTypeConditionError);
  });

  it("throws ScalarCoercion for a leaf of the wrong type", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY);

    expect(() => {
      encodeResponse(tree, { computers: [{ id: 1.5, cpu: "M1", __typename: "Computer" }] });
    }).toThrow(ScalarCoercionError);
  });
});
