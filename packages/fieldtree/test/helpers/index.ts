import { readFileSync } from "node:fs";
import { buildSchema, type DocumentNode } from "graphql";
import gql from "graphql-tag";
import { compileTree } from "@/src/compiler";
import type { CanonicalTree, CompileOptions, Field } from "@/src/compiler/types";

export const schema = buildSchema(readFileSync(new URL("./schema.graphql", import.meta.url), "utf8"));

export const createTestTree = (
  document: DocumentNode | string,
  options: Partial<CompileOptions> = {},
): CanonicalTree => {
  return compileTree(document, schema, { catchAll: false, ...options });
};

export const keysOf = (fields: readonly Field[]): string[] => fields.map(f => f.responseKey);

/** walk a dotted path of response keys through nested selections */
export const fieldAt = (scope: { selectionMap: ReadonlyMap<string, Field> }, path: string): Field => {
  let current: { selectionMap: ReadonlyMap<string, Field> } = scope;
  let found: Field | undefined;
  for (const key of path.split(".")) {
    found = current.selectionMap.get(key);
    if (!found) throw new Error(`No field "${key}" in path "${path}"`);
    current = found;
  }
  if (!found) throw new Error(`Empty path`);
  return found;
};

export async function* patchesOf<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item;
  }
}

export const operations = {
  COMPUTERS_QUERY: gql`
    query Computers {
      computers {
        id
        cpu
      }
    }
  `,

  SIBLING_FRAGMENTS_QUERY: gql`
    query Computers {
      computers {
        ...ComputerId
        ...ComputerSpecs
      }
    }

    fragment ComputerId on Computer {
      id
    }

    fragment ComputerSpecs on Computer {
      id
      cpu
    }
  `,

  HERO_QUERY: gql`
    query Hero {
      hero {
        ... on Human {
          name
          homePlanet
        }
        ... on Droid {
          name
          primaryFunction
        }
      }
    }
  `,

  HERO_DETAILS_QUERY: gql`
    query HeroDetails {
      hero {
        ...HeroDetails
        ... on Droid {
          primaryFunction
        }
      }
    }

    fragment HeroDetails on Character {
      name
    }
  `,

  SEARCH_QUERY: gql`
    query Search($text: String!) {
      search(text: $text) {
        ... on Character {
          name
          ... on Droid {
            primaryFunction
          }
        }
      }
    }
  `,

  COMPUTER_QUERY: gql`
    query Computer($id: ID!, $withScreen: Boolean!) {
      computer(id: $id) {
        id
        screen @include(if: $withScreen) {
          size
        }
      }
    }
  `,

  DEFERRED_SCREEN_QUERY: gql`
    query DeferredScreen {
      computers {
        id
        ... @defer {
          screen {
            resolution
          }
        }
      }
    }
  `,

  DEFERRED_SPECS_QUERY: gql`
    query DeferredSpecs {
      computers {
        id
        ... @defer(label: "specs") {
          cpu
          year
        }
      }
    }
  `,

  NESTED_DEFER_QUERY: gql`
    query NestedDefer {
      computer(id: "c1") {
        id
        ... @defer(label: "outer") {
          screen {
            size
            ... @defer(label: "inner") {
              resolution
            }
          }
        }
      }
    }
  `,
};
