/**
 * Therapy Sources
 *
 * Namespace prefixes, local-id infixes and the per-source remapping tables used
 * to turn raw source identifiers into `<namespace>:<local id>` strings.
 */

import type { SourceName } from '../types/therapy';

export interface SourceNamespace {
  prefix: string;
  // Token a bare local id needs before it matches the source's own ids
  // (Wikidata stores DrugBank ids as "00945", DrugBank uses "DB00945").
  localIdInfix: string;
}

export const SOURCE_NAMESPACES: Record<SourceName, SourceNamespace> = {
  Wikidata: { prefix: 'wikidata', localIdInfix: 'Q' },
  ChEMBL: { prefix: 'chembl', localIdInfix: 'CHEMBL' },
  NCIt: { prefix: 'ncit', localIdInfix: 'C' },
  DrugBank: { prefix: 'drugbank', localIdInfix: 'DB' },
  ChemIDplus: { prefix: 'chemidplus', localIdInfix: '' },
  RxNorm: { prefix: 'rxcui', localIdInfix: '' },
};

// Namespaces the normalizer never ingests; identifiers in them are xrefs.
export const EXTERNAL_NAMESPACES = {
  ATC: 'atc',
  BINDINGDB: 'bindingdb',
  CHEBI: 'chebi',
  CHEMSPIDER: 'chemspider',
  CVX: 'cvx',
  GUIDETOPHARMACOLOGY: 'iuphar.ligand',
  IUPHAR: 'iuphar',
  KEGGCOMPOUND: 'kegg.compound',
  KEGGDRUG: 'kegg.drug',
  MESH: 'mesh',
  MMSL: 'mmsl',
  MTHCMSFRF: 'mthcmsfrf',
  PDB: 'pdb',
  PHARMGKB: 'pharmgkb.drug',
  PUBCHEMCOMPOUND: 'pubchem.compound',
  PUBCHEMSUBSTANCE: 'pubchem.substance',
  THERAPEUTICTARGETSDB: 'ttd',
  UNII: 'unii',
  USP: 'usp',
  VANDF: 'vandf',
  ZINC: 'zinc',
} as const;

// DrugBank <external-identifier><resource> values that are kept. Anything else
// is dropped.
export const DRUGBANK_RESOURCE_PREFIXES: Record<string, string> = {
  ChEBI: EXTERNAL_NAMESPACES.CHEBI,
  ChEMBL: SOURCE_NAMESPACES.ChEMBL.prefix,
  'PubChem Compound': EXTERNAL_NAMESPACES.PUBCHEMCOMPOUND,
  'PubChem Substance': EXTERNAL_NAMESPACES.PUBCHEMSUBSTANCE,
  'KEGG Compound': EXTERNAL_NAMESPACES.KEGGCOMPOUND,
  'KEGG Drug': EXTERNAL_NAMESPACES.KEGGDRUG,
  ChemSpider: EXTERNAL_NAMESPACES.CHEMSPIDER,
  BindingDB: EXTERNAL_NAMESPACES.BINDINGDB,
  PharmGKB: EXTERNAL_NAMESPACES.PHARMGKB,
  ZINC: EXTERNAL_NAMESPACES.ZINC,
  RxCUI: SOURCE_NAMESPACES.RxNorm.prefix,
  PDB: EXTERNAL_NAMESPACES.PDB,
  'Therapeutic Targets Database': EXTERNAL_NAMESPACES.THERAPEUTICTARGETSDB,
  IUPHAR: EXTERNAL_NAMESPACES.IUPHAR,
  'Guide to Pharmacology': EXTERNAL_NAMESPACES.GUIDETOPHARMACOLOGY,
};

// RxNorm SAB values whose rows are read at all.
export const RXNORM_ALLOWED_SOURCES = [
  'ATC',
  'CVX',
  'DRUGBANK',
  'MMSL',
  'MSH',
  'MTHCMSFRF',
  'MTHSPL',
  'RXNORM',
  'USP',
  'VANDF',
] as const;

export type RxNormAllowedSource = (typeof RXNORM_ALLOWED_SOURCES)[number];

// MTHSPL codes are UNIIs.
export const RXNORM_SOURCE_NAMESPACES: Record<Exclude<RxNormAllowedSource, 'RXNORM'>, string> = {
  ATC: EXTERNAL_NAMESPACES.ATC,
  CVX: EXTERNAL_NAMESPACES.CVX,
  DRUGBANK: SOURCE_NAMESPACES.DrugBank.prefix,
  MMSL: EXTERNAL_NAMESPACES.MMSL,
  MSH: EXTERNAL_NAMESPACES.MESH,
  MTHCMSFRF: EXTERNAL_NAMESPACES.MTHCMSFRF,
  MTHSPL: EXTERNAL_NAMESPACES.UNII,
  USP: EXTERNAL_NAMESPACES.USP,
  VANDF: EXTERNAL_NAMESPACES.VANDF,
};

export const WIKIDATA_IDENTIFIER_FIELD_NAMES = [
  'casRegistry',
  'pubchemCompound',
  'pubchemSubstance',
  'chembl',
  'rxnorm',
  'drugbank',
] as const;

export type WikidataIdentifierField = (typeof WIKIDATA_IDENTIFIER_FIELD_NAMES)[number];

export interface WikidataIdentifierMapping {
  // Normalizer source the field belongs to, when it is one. casRegistry is
  // a ChemIDplus identifier.
  source: SourceName | null;
  prefix: string;
}

export const WIKIDATA_IDENTIFIER_FIELDS: Record<WikidataIdentifierField, WikidataIdentifierMapping> = {
  casRegistry: { source: 'ChemIDplus', prefix: SOURCE_NAMESPACES.ChemIDplus.prefix },
  pubchemCompound: { source: null, prefix: EXTERNAL_NAMESPACES.PUBCHEMCOMPOUND },
  pubchemSubstance: { source: null, prefix: EXTERNAL_NAMESPACES.PUBCHEMSUBSTANCE },
  chembl: { source: 'ChEMBL', prefix: SOURCE_NAMESPACES.ChEMBL.prefix },
  rxnorm: { source: 'RxNorm', prefix: SOURCE_NAMESPACES.RxNorm.prefix },
  drugbank: { source: 'DrugBank', prefix: SOURCE_NAMESPACES.DrugBank.prefix },
};
