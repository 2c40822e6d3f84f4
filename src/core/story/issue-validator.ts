import type { IssueValidationResult, IssueValidator, StoryIssue } from './types.js';

export const STOP_REPOSITORY_NOT_IN_SCOPE = 'STOP: Repository not in scope';
export const STOP_PREFIX_NOT_SUPPORTED = 'STOP: Issue prefix not supported';
export const STOP_NOT_FUNCTIONAL_STORY = 'STOP: Issue is not a functional story';

const NON_STORY_LABELS = ['epic', 'task', 'bug'];
const STORY_INDICATORS = ['as a', 'i want', 'so that', 'user story', 'acceptance criteria'];
const MIN_BODY_LENGTH = 20;

export interface IssueValidatorOptions {
  /** Empty list accepts any repository */
  allowedRepositories: string[];
  requiredTitleTags: string[];
}

/**
 * Decides whether an issue is eligible for strengthening: repository in
 * scope, required title tags present, and a functional story body.
 */
export class DefaultIssueValidator implements IssueValidator {
  constructor(private options: IssueValidatorOptions) {}

  validateIssue(issue: StoryIssue): IssueValidationResult {
    if (!this.isRepositoryInScope(issue.repository)) {
      return {
        valid: false,
        stopPhrase: STOP_REPOSITORY_NOT_IN_SCOPE,
        reason: `Repository '${issue.repository}' is not in scope. Expected one of: ${this.options.allowedRepositories.join(', ')}`,
      };
    }

    const missingTags = this.options.requiredTitleTags.filter(
      (tag) => !issue.title.includes(tag)
    );
    if (missingTags.length > 0) {
      return {
        valid: false,
        stopPhrase: STOP_PREFIX_NOT_SUPPORTED,
        reason: `Issue title '${issue.title}' does not contain required tags ${this.options.requiredTitleTags.join(' ')}`,
      };
    }

    if (!isFunctionalStory(issue)) {
      return {
        valid: false,
        stopPhrase: STOP_NOT_FUNCTIONAL_STORY,
        reason: 'Issue does not represent a functional story (may be epic, task, or bug)',
      };
    }

    return { valid: true };
  }

  private isRepositoryInScope(repository: string): boolean {
    const allowed = this.options.allowedRepositories;
    if (allowed.length === 0) {
      return true;
    }
    // "owner/name" matches an entry for either the full slug or the name
    const name = repository.split('/').pop() ?? repository;
    return allowed.includes(repository) || allowed.includes(name);
  }
}

function isFunctionalStory(issue: StoryIssue): boolean {
  const nonStory = issue.labels.some((label) => {
    const lower = label.toLowerCase();
    return NON_STORY_LABELS.some((kind) => lower.includes(kind));
  });
  if (nonStory) {
    return false;
  }

  const body = issue.body.trim();
  if (body.length < MIN_BODY_LENGTH) {
    return false;
  }

  const lower = body.toLowerCase();
  return STORY_INDICATORS.some((indicator) => lower.includes(indicator));
}
