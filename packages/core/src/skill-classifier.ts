import { matches, matchesAny } from './primitives.js';

/** Markers of a skill that carries its methodology inline */
const METHODOLOGY_MARKERS: readonly RegExp[] = [
  /## Workflow/i,
  /### Phase \d/i,
  /## Algorithm/i,
  /## Process/i,
  /### Step \d/i,
];

export const DEGENERALIZATION = /degeneralized|degeneralization/i;
const READ_REFERENCE = 'Read(references/';
const TABLE_ROW_READ_REFERENCE = /^\s*\|.*\|.*Read\(references\//m;

/** A short file is one below this many lines */
const SHORT_SKILL_LINES = 150;

/** Indicators that must agree before a skill is treated as a thin router */
const THIN_ROUTER_QUORUM = 2;

export interface ThinRouterIndicators {
  /** Body mentions the references/ directory */
  referencesDirectory: boolean;
  /** Body carries a degeneralization note */
  degeneralized: boolean;
  /** Short file that calls Read(references/...) */
  shortWithReadCall: boolean;
  /** A table row routes to Read(references/...) */
  routingTableRow: boolean;
}

/**
 * True when the body has workflow, phase, algorithm, process or step
 * headings, i.e. the methodology lives in the skill itself.
 */
export function isMethodologySkill(body: string): boolean {
  return matchesAny(body, METHODOLOGY_MARKERS);
}

export function thinRouterIndicators(body: string, lineCount: number): ThinRouterIndicators {
  return {
    referencesDirectory: body.includes('references/'),
    degeneralized: matches(body, DEGENERALIZATION),
    shortWithReadCall: lineCount < SHORT_SKILL_LINES && body.includes(READ_REFERENCE),
    routingTableRow: matches(body, TABLE_ROW_READ_REFERENCE),
  };
}

/**
 * Decide whether a skill is a thin router: a dispatch table pointing at
 * reference files instead of inline methodology.
 *
 * Methodology markers always win. Otherwise at least two of the four
 * indicators must hold; a single one is not enough.
 */
export function isThinRouter(body: string, lineCount: number): boolean {
  if (isMethodologySkill(body)) {
    return false;
  }

  const votes = Object.values(thinRouterIndicators(body, lineCount)).filter(Boolean).length;
  return votes >= THIN_ROUTER_QUORUM;
}
