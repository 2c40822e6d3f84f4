import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { StoryIssue } from '../core/story/types.js';

export interface IssueStore {
  /** Store an issue and return its id */
  create(issue: StoryIssue): Promise<string>;
  get(id: string): Promise<StoryIssue | null>;
}

export const StoryIssueSchema = z.object({
  number: z.number().int().nonnegative().default(0),
  title: z.string().default(''),
  body: z.string().default(''),
  labels: z.array(z.string()).default([]),
  repository: z.string().default(''),
});

const ISSUE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Candidate ids in order: `issue-<number>`, then `issue-<number>-2`, `-3`...
 * for a numbered issue; `issue-local-<n>` from the given start otherwise
 */
function candidateId(issue: StoryIssue, attempt: number, localStart: number): string {
  if (issue.number > 0) {
    return attempt === 0 ? `issue-${issue.number}` : `issue-${issue.number}-${attempt + 1}`;
  }
  return `issue-local-${localStart + attempt}`;
}

/**
 * Issue store held in memory; used by tests and one-off runs
 */
export class InMemoryIssueStore implements IssueStore {
  private issues: Map<string, StoryIssue> = new Map();
  private sequence: number = 0;

  async create(issue: StoryIssue): Promise<string> {
    const localStart = issue.number > 0 ? 0 : ++this.sequence;
    let attempt = 0;
    let id = candidateId(issue, attempt, localStart);
    while (this.issues.has(id)) {
      id = candidateId(issue, ++attempt, localStart);
    }
    this.issues.set(id, { ...issue, labels: [...issue.labels] });
    return id;
  }

  async get(id: string): Promise<StoryIssue | null> {
    const issue = this.issues.get(id);
    return issue ? { ...issue, labels: [...issue.labels] } : null;
  }
}

export interface FileIssueStoreOptions {
  /** State directory, normally <projectRoot>/.switchboard */
  stateDir: string;
}

/**
 * One JSON file per issue under <stateDir>/issues
 */
export class FileIssueStore implements IssueStore {
  private issuesDir: string;

  constructor(options: FileIssueStoreOptions) {
    this.issuesDir = path.join(options.stateDir, 'issues');
  }

  async init(): Promise<void> {
    await fs.mkdir(this.issuesDir, { recursive: true });
  }

  async create(issue: StoryIssue): Promise<string> {
    await this.init();
    const existing = await fs.readdir(this.issuesDir);
    const localStart = existing.filter((f) => f.endsWith('.json')).length + 1;
    const content = JSON.stringify({ issue, savedAt: new Date().toISOString() }, null, 2);

    // 'wx' refuses an existing file, so concurrent creates never share an id
    for (let attempt = 0; ; attempt++) {
      const id = candidateId(issue, attempt, localStart);
      try {
        await fs.writeFile(this.fileFor(id), content, { encoding: 'utf-8', flag: 'wx' });
        return id;
      } catch (error) {
        if (!hasErrorCode(error, 'EEXIST')) {
          throw error;
        }
      }
    }
  }

  async get(id: string): Promise<StoryIssue | null> {
    if (!ISSUE_ID.test(id)) {
      return null;
    }

    let content: string;
    try {
      content = await fs.readFile(this.fileFor(id), 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(content);
    const entry = z.object({ issue: StoryIssueSchema }).parse(parsed);
    return entry.issue;
  }

  private fileFor(id: string): string {
    return path.join(this.issuesDir, `${id}.json`);
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
