import type { IssueStore } from '../../integrations/issue-store.js';
import type { StoryPipeline } from '../story/pipeline.js';
import type { StopCause, StoryIssue } from '../story/types.js';
import { readNumber, readString, readStringList } from './context.js';
import { defineAgent, fail, succeed } from './contract.js';
import type { Agent } from './types.js';

export const STORY_AGENT_ID = 'story-agent';
export const STORY_CONFIDENCE = 0.9;

const STOP_CATEGORIES: Record<StopCause, 'validation' | 'loop_detected' | 'handler_error'> = {
  validation: 'validation',
  loop: 'loop_detected',
  error: 'handler_error',
};

export interface StoryAgentOptions {
  pipeline: StoryPipeline;
  /** Needed only for requests that reference an issue by id */
  issueStore?: IssueStore;
}

interface StoryContext {
  issueId: string;
  number: number;
  title: string;
  body: string;
  labels: string[];
  repository: string;
}

/**
 * Runs the story pipeline over an issue given inline in the context
 * properties (title, body, labels, repository, number) or by issueId.
 * Title and body fall back to the request description.
 */
export function createStoryAgent(options: StoryAgentOptions): Agent {
  const { pipeline, issueStore } = options;

  const resolveIssue = async (
    ctx: StoryContext,
    description: string
  ): Promise<StoryIssue | null> => {
    if (ctx.issueId) {
      return issueStore ? issueStore.get(ctx.issueId) : null;
    }
    return {
      number: ctx.number,
      title: ctx.title || description,
      body: ctx.body || description,
      labels: ctx.labels,
      repository: ctx.repository,
    };
  };

  return defineAgent<StoryContext>({
    id: STORY_AGENT_ID,
    name: 'Story Strengthening Agent',
    domain: 'requirements',
    capabilities: [
      'story-strengthening',
      'requirements-analysis',
      'ears',
      'gherkin',
      'acceptance-criteria',
    ],
    types: ['story', 'story-strengthening'],
    requiredPermissions: ['QUALITY_ASSESS'],

    validate: (request) => {
      const issueId = readString(request.context.properties, 'issueId');
      if (issueId && !issueStore) {
        return `Cannot resolve issue '${issueId}': no issue store configured`;
      }
      return null;
    },

    extractContext: (context) => ({
      issueId: readString(context.properties, 'issueId').trim(),
      number: readNumber(context.properties, 'number', 0),
      title: readString(context.properties, 'title'),
      body: readString(context.properties, 'body'),
      labels: readStringList(context.properties, 'labels'),
      repository:
        readString(context.properties, 'repository') || readString(context.properties, 'repo'),
    }),

    execute: async (request, ctx) => {
      const issue = await resolveIssue(ctx, request.description);
      if (!issue) {
        return fail('validation', `Issue '${ctx.issueId}' not found`);
      }

      const result = pipeline.processIssue(issue);
      if (result.success) {
        return succeed(
          result.output,
          STORY_CONFIDENCE,
          ['Review and refine the strengthened requirements'],
          { issueNumber: issue.number }
        );
      }

      return fail(STOP_CATEGORIES[result.cause], result.reason, {
        output: `${result.stopPhrase}: ${result.reason}`,
        context: { stopPhrase: result.stopPhrase, stage: result.stage, issueNumber: issue.number },
      });
    },
  });
}
