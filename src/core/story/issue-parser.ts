import { IssueParseError } from '../errors.js';
import type { IssueParser, IssueSection, ParsedIssue, StoryIssue } from './types.js';

const HEADING = /^ {0,3}#{1,6}\s+(.*?)\s*#*\s*$/;
const FENCE = /^ {0,3}(```|~~~)/;

/**
 * Splits a markdown issue body into heading-delimited sections.
 * Text before the first heading belongs to no section. Headings inside
 * fenced code blocks are treated as content.
 */
export class MarkdownIssueParser implements IssueParser {
  parseIssue(issue: StoryIssue): ParsedIssue {
    try {
      return {
        number: issue.number,
        title: issue.title,
        labels: [...issue.labels],
        repository: issue.repository,
        body: issue.body,
        sections: parseSections(issue.body),
      };
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new IssueParseError(
        `Failed to parse issue ${issue.repository}#${issue.number}: ${detail}`
      );
    }
  }
}

export function parseSections(body: string): IssueSection[] {
  const sections: IssueSection[] = [];
  if (!body.trim()) {
    return sections;
  }

  let heading: string | null = null;
  let content: string[] = [];
  let fence: { marker: string; line: number } | null = null;

  const flush = () => {
    if (heading !== null) {
      sections.push({ heading, content: content.join('\n').trim() });
    }
    content = [];
  };

  const lines = body.split(/\r?\n/);
  for (let index = 0; index < lines.length; index++) {
    const line = lines[index];

    const fenceMatch = FENCE.exec(line);
    if (fenceMatch) {
      if (fence === null) {
        fence = { marker: fenceMatch[1], line: index + 1 };
      } else if (fence.marker === fenceMatch[1]) {
        fence = null;
      }
      content.push(line);
      continue;
    }

    const headingMatch = fence === null ? HEADING.exec(line) : null;
    if (headingMatch) {
      flush();
      heading = headingMatch[1];
      continue;
    }

    content.push(line);
  }

  if (fence !== null) {
    throw new Error(`Unterminated code block starting at line ${fence.line}`);
  }

  flush();
  return sections;
}
