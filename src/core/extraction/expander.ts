/**
 * Related-Entity Expander
 *
 * Turns the related directives carried by seeds into extra terms. Closure
 * directives are batched: every "ancestors" seed shares one upward closure
 * and every "descendants" seed one downward closure. "parents" and
 * "children" are single-hop lookups.
 *
 * @module
 */

import type { IFactStore } from "../interfaces/IFactStore.js";
import type {
  IntermediatesPolicy,
  RelatedDirective,
  SeedTerm,
  TermId,
} from "../../types/index.js";
import { ConfigError, ErrorCode } from "../errors.js";
import type { HierarchyResolver } from "../hierarchy/resolver.js";
import {
  allDescendants,
  bottomDescendants,
  cappedAncestors,
  nearestFrontierAncestors,
} from "../hierarchy/frontier.js";
import type { AdjacencyMap } from "../hierarchy/closure.js";
import { type Logger, createLogger } from "../../utils/logger.js";

const KNOWN_DIRECTIVES: ReadonlySet<string> = new Set<RelatedDirective>([
  "ancestors",
  "descendants",
  "parents",
  "children",
]);

function unknownDirective(seed: SeedTerm, directive: string): ConfigError {
  return new ConfigError(
    `Unknown 'related' keyword for '${seed.id}': ${directive}`,
    ErrorCode.CONFIG_UNKNOWN_DIRECTIVE,
    { term: seed.id, directive }
  );
}

export class RelatedEntityExpander {
  private readonly logger: Logger;

  constructor(
    private readonly store: IFactStore,
    private readonly resolver: HierarchyResolver,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("expander");
  }

  /**
   * Extra terms pulled in by the seeds' directives. Seeds themselves are the
   * frontier: ancestor walks stop at the first seed they meet.
   *
   * @throws {ConfigError} before any store access if a directive is unknown
   */
  async expand(
    seeds: ReadonlyMap<TermId, SeedTerm>,
    intermediates: IntermediatesPolicy
  ): Promise<Set<TermId>> {
    const ordered = [...seeds.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

    const upward: TermId[] = [];
    const downward: TermId[] = [];
    for (const seed of ordered) {
      for (const directive of seed.related) {
        if (!KNOWN_DIRECTIVES.has(directive)) throw unknownDirective(seed, directive);
        if (directive === "ancestors") upward.push(seed.id);
        if (directive === "descendants") downward.push(seed.id);
      }
    }

    const frontier: ReadonlySet<TermId> = new Set(seeds.keys());
    const ancestors: AdjacencyMap =
      upward.length > 0 ? await this.resolver.ancestorsOf(upward) : new Map();
    const descendants: AdjacencyMap =
      downward.length > 0 ? await this.resolver.descendantsOf(downward) : new Map();

    const extra = new Set<TermId>();
    const add = (terms: Iterable<TermId>): void => {
      for (const term of terms) extra.add(term);
    };

    for (const seed of ordered) {
      for (const directive of seed.related) {
        switch (directive) {
          case "ancestors":
            add(
              intermediates === "none"
                ? nearestFrontierAncestors(ancestors, seed.id, frontier)
                : cappedAncestors(ancestors, frontier, seed.id)
            );
            break;
          case "descendants":
            add(
              intermediates === "none"
                ? bottomDescendants(descendants, seed.id)
                : allDescendants(descendants, seed.id)
            );
            break;
          case "parents":
            add(await this.store.parentsOf(seed.id));
            break;
          case "children":
            add(await this.store.childrenOf(seed.id));
            break;
          default:
            throw unknownDirective(seed, directive);
        }
      }
    }

    this.logger.debug(
      { seeds: seeds.size, upward: upward.length, downward: downward.length, extra: extra.size },
      "Related entities expanded"
    );
    return extra;
  }
}
