import type { EarsPattern, Requirement } from './types.js';

/**
 * EARS statement templates:
 *
 * - UBIQUITOUS:   THE system SHALL <action>
 * - STATE_DRIVEN: WHILE <state>, THE system SHALL <action>
 * - EVENT_DRIVEN: WHEN <trigger>, THE system SHALL <action>
 * - UNWANTED:     IF <condition>, THEN THE system SHALL <action>
 */

const SYSTEM_SHALL = 'THE system SHALL';

interface Split {
  condition: string;
  action: string;
}

type Extractor = (text: string) => Split | null;

function splitOn(pattern: RegExp, suffix = ''): Extractor {
  return (text) => {
    const match = pattern.exec(text);
    return match ? { condition: match[1].trim() + suffix, action: match[2].trim() } : null;
  };
}

const EXTRACTORS: Record<Exclude<EarsPattern, 'UBIQUITOUS'>, Extractor[]> = {
  STATE_DRIVEN: [
    splitOn(/^\s*while\s+(.+?)\s+then\s+(.+)$/is),
    splitOn(/^(?:when\s+)?(?:in|during)\s+(.+?)\s+state[,:]?\s+(.+)$/is, ' state'),
    splitOn(/^while\s+(.+?)[,:]\s+(.+)$/is),
  ],
  EVENT_DRIVEN: [
    splitOn(/^\s*when\s+(.+?)\s+then\s+(.+)$/is),
    splitOn(/^when\s+(.+?)[,:]\s+(.+)$/is),
    splitOn(/^(?:on|upon)\s+(.+?)[,:]\s+(.+)$/is),
    splitOn(/^after\s+(.+?)[,:]\s+(.+)$/is),
  ],
  UNWANTED: [
    splitOn(/^\s*if\s+(.+?)\s+then\s+(.+)$/is),
    splitOn(/^if\s+(.+?)[,:]\s+(.+)$/is),
    splitOn(/^in\s+case\s+of\s+(.+?)[,:]\s+(.+)$/is),
  ],
};

const FALLBACK_CONDITION: Record<Exclude<EarsPattern, 'UBIQUITOUS'>, string> = {
  STATE_DRIVEN: 'in the appropriate state',
  EVENT_DRIVEN: 'the event occurs',
  UNWANTED: 'an error occurs',
};

export function toEars(requirement: Requirement): string {
  const text = requirement.text.trim();

  if (requirement.pattern === 'UBIQUITOUS') {
    return `${SYSTEM_SHALL} ${normalizeAction(text.replace(/^always\s+/i, ''))}`;
  }

  const split = firstSplit(EXTRACTORS[requirement.pattern], text) ?? {
    condition: FALLBACK_CONDITION[requirement.pattern],
    action: text,
  };
  const action = normalizeAction(split.action);

  switch (requirement.pattern) {
    case 'STATE_DRIVEN':
      return `WHILE ${split.condition}, ${SYSTEM_SHALL} ${action}`;
    case 'EVENT_DRIVEN':
      return `WHEN ${split.condition}, ${SYSTEM_SHALL} ${action}`;
    case 'UNWANTED':
      return `IF ${split.condition}, THEN ${SYSTEM_SHALL} ${action}`;
  }
}

function firstSplit(extractors: Extractor[], text: string): Split | null {
  for (const extract of extractors) {
    const split = extract(text);
    if (split) {
      return split;
    }
  }
  return null;
}

/**
 * Drops a leading "the system shall/must/should/will" or "then" and
 * lower-cases the first letter.
 */
export function normalizeAction(action: string): string {
  const stripped = action
    .trim()
    .replace(/^(?:the\s+)?system\s+(?:shall|must|should|will)\s+/i, '')
    .replace(/^(?:must|should|will|shall)\s+/i, '')
    .replace(/^then\s+/i, '');
  return stripped.charAt(0).toLowerCase() + stripped.slice(1);
}
