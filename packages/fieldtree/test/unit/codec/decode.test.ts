import gql from "graphql-tag";
import { decodeResponse } from "@/src/codec/decode";
import {
  MissingRequiredFieldError,
  MissingVariableError,
  NonNullViolationError,
  ScalarCoercionError,
  UnexpectedValueError,
  UnhandledTypeConditionError,
} from "@/src/core/errors";
import { createTestTree, operations } from "@/test/helpers";

describe("decodeResponse", () => {
  it("builds output in canonical order whatever the input order", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY);

    const { data, errors } = decodeResponse(tree, {
      computers: [{ __typename: "Computer", cpu: "M1", id: "c1" }],
    });

    expect(errors).toEqual([]);
    expect(JSON.stringify(data)).toBe('{"computers":[{"id":"c1","cpu":"M1","__typename":"Computer"}]}');
  });

  it("ignores keys that are not selected", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY, { addTypename: false });

    const { data } = decodeResponse(tree, { computers: [{ id: "c1", cpu: "M1", year: 2020 }], extra: true });

    expect(data).toEqual({ computers: [{ id: "c1", cpu: "M1" }] });
  });

  it("decodes absent nullable fields to null", () => {
    const tree = createTestTree("query Q { computers { screen { size } } }", { addTypename: false });

    const { data } = decodeResponse(tree, { computers: [{ screen: {} }] });

    expect(data).toEqual({ computers: [{ screen: { size: null } }] });
  });

  it("fails with MissingRequiredField for an absent non-null field", () => {
    const tree = createTestTree("fragment HumanName on Human { name }", { addTypename: false });

    const { data, errors } = decodeResponse(tree, {});

    expect(data).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(MissingRequiredFieldError);
    expect(errors[0].path).toEqual(["name"]);
    expect(errors[0].message).toBe("Missing required field name");
  });

  it("nulls the nearest nullable position and records the error", () => {
    const tree = createTestTree('query Q { computer(id: "c1") { id year } }', { addTypename: false });

    const { data, errors } = decodeResponse(tree, { computer: { id: "c1", year: "1999" } });

    expect(data).toEqual({ computer: null });
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(ScalarCoercionError);
    expect(errors[0].message).toBe('Cannot coerce Int at computer.year: got string "1999"');
    expect(errors[0].path).toEqual(["computer", "year"]);
  });

  it("nulls the whole payload when no position up to the root is nullable", () => {
    const tree = createTestTree("query Q { computers { year } }", { addTypename: false });

    const { data, errors } = decodeResponse(tree, { computers: [{ year: 1999 }, { year: "2000" }] });

    expect(data).toBeNull();
    expect(errors[0].path).toEqual(["computers", 1, "year"]);
  });

  it("nulls nullable list items one by one", () => {
    const tree = createTestTree("query Q { hero { appearsIn } }", { addTypename: false });

    const { data, errors } = decodeResponse(tree, { hero: { appearsIn: ["JEDI", "BOGUS", null] } });

    expect(data).toEqual({ hero: { appearsIn: ["JEDI", null, null] } });
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Cannot coerce Episode at hero.appearsIn.1: string "BOGUS" is not a value of the enum');
  });

  it("fails with NonNullViolation for null in a non-null position", () => {
    const tree = createTestTree("query Q { computers { id } }", { addTypename: false });

    const { data, errors } = decodeResponse(tree, { computers: null });

    expect(data).toBeNull();
    expect(errors[0]).toBeInstanceOf(NonNullViolationError);
    expect(errors[0].message).toBe("Null value for non-null position computers");
  });

  it("fails with UnexpectedValue for a scalar where an object is selected", () => {
    const tree = createTestTree('query Q { computer(id: "c1") { id } }', { addTypename: false });

    const { data, errors } = decodeResponse(tree, { computer: "c1" });

    expect(data).toEqual({ computer: null });
    expect(errors[0]).toBeInstanceOf(UnexpectedValueError);
    expect(errors[0].message).toBe("Expected an object at computer");
  });

  it("returns null data for a null payload", () => {
    const tree = createTestTree(operations.COMPUTERS_QUERY);

    expect(decodeResponse(tree, null)).toEqual({ data: null, errors: [], deferred: [] });
  });
});

describe("decodeResponse x Polymorphism", () => {
  it("selects the variant named by __typename", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    const { data, errors } = decodeResponse(tree, { hero: { __typename: "Droid", name: "R2" } });

    expect(errors).toEqual([]);
    expect(data).toEqual({ hero: { name: "R2", primaryFunction: null, __typename: "Droid" } });
    expect(JSON.stringify(data)).toBe('{"hero":{"name":"R2","primaryFunction":null,"__typename":"Droid"}}');
  });

  it("fails with UnhandledTypeCondition for a typename no fragment covers", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    const { data, errors } = decodeResponse(tree, { hero: { __typename: "Starship", name: "Falcon" } });

    expect(data).toEqual({ hero: null });
    expect(errors[0]).toBeInstanceOf(UnhandledTypeConditionError);
    expect(errors[0].message).toBe('No selection handles type "Starship" at hero');
  });

  it("accepts a typename matched only through an interface fragment", () => {
    const tree = createTestTree(operations.HERO_DETAILS_QUERY);

    const { data, errors } = decodeResponse(tree, { hero: { __typename: "Human", name: "Luke" } });

    expect(errors).toEqual([]);
    expect(data).toEqual({ hero: { name: "Luke", __typename: "Human" } });
  });

  it("falls back to the plain selection with catchAll", () => {
    const tree = createTestTree(operations.HERO_QUERY, { catchAll: true });

    const { data, errors } = decodeResponse(tree, { hero: { __typename: "Starship", name: "Falcon" } });

    expect(errors).toEqual([]);
    expect(data).toEqual({ hero: { __typename: "Starship" } });
  });

  it("fails with MissingRequiredField when the discriminator is absent", () => {
    const tree = createTestTree(operations.HERO_QUERY);

    const { data, errors } = decodeResponse(tree, { hero: { name: "R2" } });

    expect(data).toEqual({ hero: null });
    expect(errors[0]).toBeInstanceOf(MissingRequiredFieldError);
    expect(errors[0].path).toEqual(["hero", "__typename"]);
  });

  it("takes the root typename from options", () => {
    const tree = createTestTree("fragment C on Character { ... on Droid { primaryFunction } }", { addTypename: false });

    expect(decodeResponse(tree, { primaryFunction: "astromech" }, { typename: "Droid" }).data).toEqual({
      primaryFunction: "astromech",
    });
    expect(decodeResponse(tree, { primaryFunction: "astromech" }).data).toBeNull();
  });
});

describe("decodeResponse x Variables", () => {
  it("omits fields excluded by their conditions", () => {
    const tree = createTestTree(operations.COMPUTER_QUERY, { addTypename: false });

    const { data } = decodeResponse(
      tree,
      { computer: { id: "c1", screen: { size: 13 } } },
      { variables: { id: "c1", withScreen: false } },
    );

    expect(data).toEqual({ computer: { id: "c1" } });
  });

  it("requires included fields", () => {
    const tree = createTestTree(operations.COMPUTER_QUERY, { addTypename: false });

    const { data, errors } = decodeResponse(
      tree,
      { computer: { id: "c1" } },
      { variables: { id: "c1", withScreen: true } },
    );

    expect(data).toEqual({ computer: null });
    expect(errors[0].path).toEqual(["computer", "screen"]);
  });

  it("throws MissingVariable before decoding", () => {
    const tree = createTestTree(operations.COMPUTER_QUERY, { addTypename: false });

    expect(() => decodeResponse(tree, { computer: null }, { variables: { id: "c1" } })).toThrow(MissingVariableError);
    expect(() => decodeResponse(tree, { computer: null }, { variables: { id: "c1" } })).toThrow(
      'Variable "$withScreen" is not provided and has no default',
    );
  });

  it("uses declared defaults", () => {
    const tree = createTestTree(gql`
      query Q($withScreen: Boolean = true) {
        computers { id screen @skip(if: $withScreen) { size } }
      }
    `, { addTypename: false });

    const { data } = decodeResponse(tree, { computers: [{ id: "c1", screen: { size: 1 } }] });

    expect(data).toEqual({ computers: [{ id: "c1" }] });
  });
});
