/**
 * Terminology Service
 *
 * Value set expansion, code lookup, validation, subsumption and
 * translation. Calls are synchronous; an application that talks to a
 * remote server resolves what it needs before evaluation and serves it
 * through this interface. InMemoryTerminologyService answers from tables
 * given at construction.
 */

export interface Coding {
  readonly system?: string | undefined;
  readonly code: string;
  readonly display?: string | undefined;
}

export type SubsumptionOutcome =
  | 'equivalent'
  | 'subsumes'
  | 'subsumed-by'
  | 'not-subsumed';

export interface LookupResult {
  readonly name?: string | undefined;
  readonly display?: string | undefined;
}

export interface TerminologyService {
  /** All codings of a value set, undefined when the set is unknown */
  expand(valueSet: string): readonly Coding[] | undefined;
  lookup(coding: Coding): LookupResult | undefined;
  validateVS(valueSet: string, coding: Coding): boolean | undefined;
  validateCS(codeSystem: string, coding: Coding): boolean | undefined;
  /** Relation of codeA to codeB within a code system */
  subsumes(
    system: string,
    codeA: string,
    codeB: string
  ): SubsumptionOutcome | undefined;
  translate(conceptMap: string, coding: Coding): readonly Coding[] | undefined;
  memberOf(coding: Coding, valueSet: string): boolean | undefined;
}

export interface ConceptMapping {
  readonly source: Coding;
  readonly target: Coding;
}

export interface InMemoryTerminologyOptions {
  /** Value set URL → member codings */
  valueSets?: Record<string, readonly Coding[]>;
  /** Code system URL → concepts */
  codeSystems?: Record<string, readonly Coding[]>;
  /** Code system URL → [parent, child] pairs */
  hierarchy?: Record<string, readonly (readonly [string, string])[]>;
  /** Concept map URL → mappings */
  conceptMaps?: Record<string, readonly ConceptMapping[]>;
}

function sameCoding(a: Coding, b: Coding): boolean {
  return (
    a.code === b.code &&
    (a.system === undefined || b.system === undefined || a.system === b.system)
  );
}

export class InMemoryTerminologyService implements TerminologyService {
  private readonly valueSets: Map<string, readonly Coding[]>;
  private readonly codeSystems: Map<string, readonly Coding[]>;
  private readonly hierarchy: Map<string, readonly (readonly [string, string])[]>;
  private readonly conceptMaps: Map<string, readonly ConceptMapping[]>;

  constructor(options: InMemoryTerminologyOptions = {}) {
    this.valueSets = new Map(Object.entries(options.valueSets ?? {}));
    this.codeSystems = new Map(Object.entries(options.codeSystems ?? {}));
    this.hierarchy = new Map(Object.entries(options.hierarchy ?? {}));
    this.conceptMaps = new Map(Object.entries(options.conceptMaps ?? {}));
  }

  expand(valueSet: string): readonly Coding[] | undefined {
    return this.valueSets.get(valueSet);
  }

  lookup(coding: Coding): LookupResult | undefined {
    if (coding.system === undefined) return undefined;
    const concept = this.codeSystems
      .get(coding.system)
      ?.find((entry) => entry.code === coding.code);
    if (!concept) return undefined;
    return { name: coding.system, display: concept.display };
  }

  validateVS(valueSet: string, coding: Coding): boolean | undefined {
    return this.memberOf(coding, valueSet);
  }

  validateCS(codeSystem: string, coding: Coding): boolean | undefined {
    const concepts = this.codeSystems.get(codeSystem);
    if (!concepts) return undefined;
    return concepts.some((concept) => concept.code === coding.code);
  }

  subsumes(
    system: string,
    codeA: string,
    codeB: string
  ): SubsumptionOutcome | undefined {
    const pairs = this.hierarchy.get(system);
    if (!pairs) return undefined;
    if (codeA === codeB) return 'equivalent';
    if (this.isAncestor(pairs, codeA, codeB)) return 'subsumes';
    if (this.isAncestor(pairs, codeB, codeA)) return 'subsumed-by';
    return 'not-subsumed';
  }

  translate(conceptMap: string, coding: Coding): readonly Coding[] | undefined {
    const mappings = this.conceptMaps.get(conceptMap);
    if (!mappings) return undefined;
    return mappings
      .filter((mapping) => sameCoding(mapping.source, coding))
      .map((mapping) => mapping.target);
  }

  memberOf(coding: Coding, valueSet: string): boolean | undefined {
    const members = this.valueSets.get(valueSet);
    if (!members) return undefined;
    return members.some((member) => sameCoding(member, coding));
  }

  /** Breadth-first walk down from `ancestor` looking for `code` */
  private isAncestor(
    pairs: readonly (readonly [string, string])[],
    ancestor: string,
    code: string
  ): boolean {
    const seen = new Set<string>([ancestor]);
    const queue = [ancestor];
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      for (const [parent, child] of pairs) {
        if (parent !== next || seen.has(child)) continue;
        if (child === code) return true;
        seen.add(child);
        queue.push(child);
      }
    }
    return false;
  }
}
