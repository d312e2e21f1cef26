import { SOURCE_NAMESPACES } from '../data/therapySources';
import { SOURCE_NAMES, type SourceName } from '../types/therapy';

export type IdentifierClass = 'other_identifier' | 'xref';

/** Namespace prefixes of the sources this normalizer ingests, lowercased. */
export type NormalizerRegistry = ReadonlySet<string>;

export type PartitionedIdentifiers = {
  otherIdentifiers: string[];
  xrefs: string[];
};

export function buildNormalizerRegistry(
  sources: readonly SourceName[] = SOURCE_NAMES,
): NormalizerRegistry {
  return new Set(sources.map((source) => SOURCE_NAMESPACES[source].prefix.toLowerCase()));
}

export function namespaceOf(identifier: string): string {
  const separator = identifier.indexOf(':');
  return separator === -1 ? identifier : identifier.slice(0, separator);
}

/**
 * Decides whether identifiers in a namespace resolve inside this index
 * (`other_identifier`) or only point elsewhere (`xref`). Unknown namespaces
 * are xrefs.
 */
export function classifyNamespace(
  namespace: string,
  registry: NormalizerRegistry,
): IdentifierClass {
  return registry.has(namespace.trim().toLowerCase()) ? 'other_identifier' : 'xref';
}

export function classifyIdentifier(
  identifier: string,
  registry: NormalizerRegistry,
): IdentifierClass {
  return classifyNamespace(namespaceOf(identifier), registry);
}

/**
 * Splits identifiers into disjoint other-identifier and xref lists, keeping
 * first-seen order and dropping exact repeats and blanks.
 */
export function partitionIdentifiers(
  identifiers: Iterable<string>,
  registry: NormalizerRegistry,
): PartitionedIdentifiers {
  const seen = new Set<string>();
  const result: PartitionedIdentifiers = { otherIdentifiers: [], xrefs: [] };

  for (const raw of identifiers) {
    const identifier = raw.trim();
    if (!identifier || seen.has(identifier)) {
      continue;
    }
    seen.add(identifier);

    if (classifyIdentifier(identifier, registry) === 'other_identifier') {
      result.otherIdentifiers.push(identifier);
    } else {
      result.xrefs.push(identifier);
    }
  }

  return result;
}
