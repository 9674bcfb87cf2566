/**
 * Flag Detector - maps ordinance wording to the yes/no columns of the export
 */

import { getSection } from './text-normalizer.js';
import type { OrdinanceFlags, DelegationFlag } from './types.js';

type SimpleFlag = Exclude<keyof OrdinanceFlags, 'delegation'>;

interface FlagRule<K extends SimpleFlag> {
  pattern: RegExp;
  present: OrdinanceFlags[K];
  absent: OrdinanceFlags[K];
}

// Patterns run against the lower-cased full text
export const FLAG_RULES: { [K in SimpleFlag]: FlagRule<K> } = {
  publicTransport: {
    pattern: /trasporto pubblico urbano|linee bus|trasporto pubblico/,
    present: 'TRASPORTO_SI',
    absent: 'no T',
  },
  restrictedZone: {
    pattern: /\bztl\b|portali/,
    present: 'ZTL_SI',
    absent: 'no Z',
  },
  bikeLane: {
    pattern: /pista ciclabile/,
    present: 'PISTA CICLABILE SI',
    absent: 'no P',
  },
  metro: {
    pattern: /\bmetro\b|metropolitana/,
    present: 'METRO SI',
    absent: 'no M',
  },
  mobilityAgency: {
    pattern: /brescia mobilit[aà]/,
    present: "BRESCIA MOBILITA' SI",
    absent: 'no B',
  },
  taxi: {
    pattern: /\btaxi\b/,
    present: 'TAXI SI',
    absent: 'no T',
  },
};

const DELEGATION_HEADING = /\bDEMANDA\b/i;
const DELEGATION_END = /\b(?:AVVERTE|Per il Responsabile|IL RESPONSABILE)\b/i;
const SIGNAGE_BY_DEPARTMENT = /(settore strade|servizio gestione traffico)[\s\S]*(posizionamento|segnaletica)/;
const SIGNAGE_BY_CONTRACTOR = /all[’']impresa/;

/**
 * Text of the "DEMANDA" section, up to the next closing heading
 */
export function getDelegationSection(fullText: string): string {
  return getSection(fullText, DELEGATION_HEADING, DELEGATION_END) ?? '';
}

export function detectDelegation(fullText: string): DelegationFlag {
  const section = getDelegationSection(fullText).toLowerCase();
  if (!section) return 'no D';

  if (SIGNAGE_BY_DEPARTMENT.test(section)) {
    return 'SQ. MULTIDISC. SI';
  }

  // NOTE: both outcomes of the contractor check give "no D". Kept as found in
  // the municipal workflow; it may hide a missing third value.
  if (SIGNAGE_BY_CONTRACTOR.test(section)) {
    return 'no D';
  }
  return 'no D';
}

function detect<K extends SimpleFlag>(key: K, lowered: string): OrdinanceFlags[K] {
  const rule: FlagRule<K> = FLAG_RULES[key];
  return rule.pattern.test(lowered) ? rule.present : rule.absent;
}

export function detectFlags(fullText: string): OrdinanceFlags {
  const lowered = (fullText || '').toLowerCase();

  return {
    publicTransport: detect('publicTransport', lowered),
    restrictedZone: detect('restrictedZone', lowered),
    delegation: detectDelegation(fullText || ''),
    bikeLane: detect('bikeLane', lowered),
    metro: detect('metro', lowered),
    mobilityAgency: detect('mobilityAgency', lowered),
    taxi: detect('taxi', lowered),
  };
}
