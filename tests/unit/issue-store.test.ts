import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileIssueStore, InMemoryIssueStore } from '../../src/integrations/issue-store.js';
import type { StoryIssue } from '../../src/core/story/types.js';

const issue: StoryIssue = {
  number: 5,
  title: '[STORY] Reset password',
  body: 'As a user, I want to reset my password so that I can sign in again.',
  labels: ['story'],
  repository: 'acme/accounts',
};

describe('InMemoryIssueStore', () => {
  it('should number local issues and copy on the way out', async () => {
    const store = new InMemoryIssueStore();
    const id = await store.create({ ...issue, number: 0 });
    expect(id).toBe('issue-local-1');

    const loaded = await store.get(id);
    loaded?.labels.push('mutated');
    expect((await store.get(id))?.labels).toEqual(['story']);
    expect(await store.get('issue-404')).toBeNull();
  });

  it('should keep both issues stored under the same number', async () => {
    const store = new InMemoryIssueStore();
    const first = await store.create({ ...issue, number: 7, title: 'C' });
    const second = await store.create({ ...issue, number: 7, title: 'D' });

    expect(first).toBe('issue-7');
    expect(second).toBe('issue-7-2');
    expect((await store.get('issue-7'))?.title).toBe('C');
    expect((await store.get('issue-7-2'))?.title).toBe('D');
  });
});

describe('FileIssueStore', () => {
  let stateDir: string;
  let store: FileIssueStore;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), 'switchboard-issues-'));
    store = new FileIssueStore({ stateDir });
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it('should persist issues as JSON files', async () => {
    const id = await store.create(issue);

    expect(id).toBe('issue-5');
    const raw = JSON.parse(await fs.readFile(path.join(stateDir, 'issues', 'issue-5.json'), 'utf-8'));
    expect(raw.issue).toEqual(issue);
    expect(typeof raw.savedAt).toBe('string');
    expect(await store.get(id)).toEqual(issue);
  });

  it('should keep both issues stored under the same number', async () => {
    const first = await store.create({ ...issue, number: 7, title: 'C' });
    const second = await store.create({ ...issue, number: 7, title: 'D' });

    expect(first).toBe('issue-7');
    expect(second).toBe('issue-7-2');
    expect((await store.get('issue-7'))?.title).toBe('C');
    expect((await store.get('issue-7-2'))?.title).toBe('D');
  });

  it('should give concurrent local issues distinct ids', async () => {
    const ids = await Promise.all([
      store.create({ ...issue, number: 0, title: 'first' }),
      store.create({ ...issue, number: 0, title: 'second' }),
    ]);

    expect(new Set(ids).size).toBe(2);
    const titles = await Promise.all(ids.map(async (id) => (await store.get(id))?.title));
    expect(titles.sort()).toEqual(['first', 'second']);
  });

  it('should return null for unknown or unsafe ids', async () => {
    await store.init();
    expect(await store.get('issue-77')).toBeNull();
    expect(await store.get('../secrets')).toBeNull();
  });

  it('should reject a file that does not hold an issue', async () => {
    await store.init();
    await fs.writeFile(path.join(stateDir, 'issues', 'issue-9.json'), JSON.stringify({ issue: { number: 'nine' } }));

    await expect(store.get('issue-9')).rejects.toThrow();
  });
});
