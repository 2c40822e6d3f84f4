import type { GherkinScenario, Requirement } from './types.js';

const MODAL_VERBS = ['should', 'may', 'might', 'could', 'would', 'ideally', 'possibly', 'perhaps'];
const NARRATIVE_PHRASES = [
  'in order to',
  'as mentioned',
  'note that',
  'for example',
  'please note',
  'keep in mind',
  'it is important to',
];

const GIVEN_PATTERN = /\b(?:given|assuming|provided that)\s+([^,.]+)/gi;
const WHEN_PATTERN = /\b(?:when|if|upon|after)\s+([^,.]+)/gi;
const IMPLIED_STATE = /\b(authenticated|logged in|authorized|active)\b/i;
const OUTCOME_VERBS =
  /\b(?:is|are|has|have|displays|shows|returns|creates|updates|deletes|sends|receives|stores|records|rejects)\b/i;
const SYSTEM_PREFIX = /^(?:the\s+)?system\s+(?:shall|must|will|should)\s+/i;
const CONDITION_PREFIX = /^(?:when|if|given|while|upon|after)\s+[^,]+,\s*/i;

const MAX_NAME_LENGTH = 80;

/**
 * Build a Given/When/Then scenario from one requirement. Modal verbs and
 * narrative phrases are removed; compound "and" conditions are split into
 * separate steps.
 */
export function toScenario(requirement: Requirement): GherkinScenario {
  const text = removeNarrative(requirement.text.trim());

  const given = clauses(text, GIVEN_PATTERN);
  if (given.length === 0) {
    const implied = IMPLIED_STATE.exec(text);
    if (implied) {
      given.push(`the user is ${implied[1].toLowerCase()}`);
    }
  }

  const when = clauses(text, WHEN_PATTERN);
  if (when.length === 0) {
    when.push('the action is performed');
  }

  const then = [makeVerifiable(outcome(text))];

  return {
    name: scenarioName(text),
    given: splitCompound(given),
    when: splitCompound(when),
    then: splitCompound(then),
  };
}

export function formatScenario(scenario: GherkinScenario): string {
  const lines = [`Scenario: ${scenario.name}`];
  const steps: Array<[keyword: string, clauses: string[]]> = [
    ['Given', scenario.given],
    ['When', scenario.when],
    ['Then', scenario.then],
  ];
  for (const [keyword, stepClauses] of steps) {
    stepClauses.forEach((clause, index) => {
      lines.push(`  ${index === 0 ? keyword : 'And'} ${clause}`);
    });
  }
  return lines.join('\n');
}

function scenarioName(text: string): string {
  const stripped = text
    .replace(SYSTEM_PREFIX, '')
    .replace(/^(?:when|if|given|while)\s+/i, '');
  const name = removeModals(stripped.split(/[,.]/)[0].trim());
  const capitalized = name.charAt(0).toUpperCase() + name.slice(1);
  return capitalized.length > MAX_NAME_LENGTH
    ? `${capitalized.slice(0, MAX_NAME_LENGTH - 3)}...`
    : capitalized;
}

function clauses(text: string, pattern: RegExp): string[] {
  const found: string[] = [];
  for (const match of text.matchAll(pattern)) {
    const clause = normalizeClause(removeModals(match[1]));
    if (clause) {
      found.push(clause);
    }
  }
  return found;
}

function outcome(text: string): string {
  const stripped = text.replace(CONDITION_PREFIX, '').replace(/^then\s+/i, '');
  const clause = stripped.replace(SYSTEM_PREFIX, '').split('.')[0];
  return normalizeClause(removeModals(clause));
}

function makeVerifiable(clause: string): string {
  if (!clause || /^the system\b/i.test(clause) || OUTCOME_VERBS.test(clause)) {
    return clause || 'the expected outcome is observable';
  }
  return `the system ${clause}`;
}

function splitCompound(stepClauses: string[]): string[] {
  return stepClauses.flatMap((clause) =>
    / and (?!then\b)/i.test(clause)
      ? clause
          .split(/\s+and\s+/i)
          .map((part) => part.trim())
          .filter((part) => part.length > 0)
      : [clause]
  );
}

export function removeModals(text: string): string {
  let result = text;
  for (const verb of MODAL_VERBS) {
    result = result.replace(new RegExp(`\\b${verb}\\b\\s*`, 'gi'), '');
  }
  return result.trim();
}

function removeNarrative(text: string): string {
  let result = text;
  for (const phrase of NARRATIVE_PHRASES) {
    result = result.replace(new RegExp(`\\b${phrase}\\b[,\\s]*`, 'gi'), '');
  }
  return result.trim();
}

function normalizeClause(clause: string): string {
  const collapsed = clause.trim().replace(/\s+/g, ' ').replace(/[,;:]$/, '');
  return collapsed.charAt(0).toLowerCase() + collapsed.slice(1);
}
