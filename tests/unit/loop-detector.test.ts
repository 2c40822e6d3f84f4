import { describe, it, expect } from 'vitest';
import { ThresholdLoopDetector, NO_LOOP } from '../../src/core/story/loop-detector.js';
import {
  buildProcessingContext,
  detectUnsafeInference,
} from '../../src/core/story/processing-context.js';
import type {
  AnalysisResult,
  GherkinScenario,
  OpenQuestion,
  ParsedIssue,
  TransformedRequirements,
} from '../../src/core/story/types.js';

const parsed: ParsedIssue = {
  number: 1,
  title: '[STORY] Upload avatars',
  labels: [],
  repository: 'acme/profiles',
  body: '',
  sections: [
    { heading: 'Acceptance Criteria', content: 'a' },
    { heading: ' acceptance criteria ', content: 'b' },
    { heading: 'Notes', content: 'c' },
  ],
};

const question: OpenQuestion = { question: 'Q?', whyItMatters: 'w', impact: 'i' };
const scenario: GherkinScenario = { name: 'S', given: [], when: ['w'], then: ['t'] };

function analysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    intent: 'upload an avatar',
    actors: ['User'],
    stakeholders: ['User'],
    preconditions: [],
    functionalRequirements: [],
    errorFlows: [],
    businessRules: [],
    dataRequirements: [],
    ambiguities: [question, question],
    ...overrides,
  };
}

function transformed(scenarios: number, questions: number): TransformedRequirements {
  return {
    header: 'Strengthened Story: Upload avatars',
    intent: 'upload an avatar',
    actors: ['User'],
    preconditions: [],
    functionalRequirements: [],
    alternateFlows: [],
    businessRules: [],
    dataRequirements: [],
    acceptanceCriteria: Array.from({ length: scenarios }, () => scenario),
    observability: [],
    openQuestions: Array.from({ length: questions }, () => question),
  };
}

const detector = new ThresholdLoopDetector({
  maxRewriteIterations: 2,
  maxAcceptanceCriteria: 3,
  maxOpenQuestions: 2,
  stopOnUnsafeInference: true,
});

describe('buildProcessingContext', () => {
  it('should number checkpoints and count repeated headings', () => {
    const context = buildProcessingContext('parse', parsed, null, null);

    expect(context.checkpoint).toBe(1);
    expect(context.sectionRewriteCounts).toEqual({ 'acceptance criteria': 2, notes: 1 });
    expect(context.acceptanceCriteriaCount).toBe(0);
    expect(context.openQuestionsCount).toBe(0);
  });

  it('should count open questions from the latest stage available', () => {
    expect(buildProcessingContext('analyze', parsed, analysis(), null).openQuestionsCount).toBe(2);

    const context = buildProcessingContext('transform', parsed, analysis(), transformed(4, 1));
    expect(context.checkpoint).toBe(3);
    expect(context.acceptanceCriteriaCount).toBe(4);
    expect(context.openQuestionsCount).toBe(1);
  });

  it('should match unsafe topics on whole words only', () => {
    expect(detectUnsafeInference(analysis({ intent: 'store GDPR consent and encrypted tokens' }))).toEqual({
      legal: false,
      financial: false,
      security: true,
      regulatory: true,
    });
    expect(detectUnsafeInference(analysis({ intent: 'show the lawn care schedule' })).legal).toBe(false);
  });
});

describe('ThresholdLoopDetector', () => {
  it('should pass a converging story', () => {
    const context = buildProcessingContext('transform', parsed, analysis(), transformed(3, 2));
    expect(detector.checkForLoops(context)).toBe(NO_LOOP);
  });

  it('should stop on a section over the rewrite limit', () => {
    const repeated: ParsedIssue = {
      ...parsed,
      sections: [...parsed.sections, { heading: 'ACCEPTANCE CRITERIA', content: 'd' }],
    };

    expect(detector.checkForLoops(buildProcessingContext('parse', repeated, null, null))).toEqual({
      loopDetected: true,
      stopPhrase: 'STOP: Section rewrite limit exceeded',
      reason: "Section 'acceptance criteria' rewritten 3 times (limit 2)",
    });
  });

  it('should stop on too many acceptance criteria before open questions', () => {
    const context = buildProcessingContext('transform', parsed, analysis(), transformed(4, 5));
    expect(detector.checkForLoops(context)).toEqual({
      loopDetected: true,
      stopPhrase: 'STOP: Too many acceptance criteria',
      reason: '4 acceptance criteria exceed the limit of 3',
    });
  });

  it('should stop on too many open questions', () => {
    const context = buildProcessingContext('transform', parsed, analysis(), transformed(1, 3));
    expect(detector.checkForLoops(context)).toEqual({
      loopDetected: true,
      stopPhrase: 'STOP: Too many open questions',
      reason: '3 open questions exceed the limit of 2',
    });
  });

  it('should stop on unsafe inference unless disabled', () => {
    const risky = analysis({
      businessRules: [{ text: 'Refunds follow the payment policy and local law', pattern: 'UBIQUITOUS', verifiable: true }],
    });
    const context = buildProcessingContext('analyze', parsed, risky, null);

    expect(detector.checkForLoops(context)).toEqual({
      loopDetected: true,
      stopPhrase: 'STOP: Requires human expertise',
      reason: 'Story requires legal, financial inference',
    });

    const lenient = new ThresholdLoopDetector({
      maxRewriteIterations: 2,
      maxAcceptanceCriteria: 3,
      maxOpenQuestions: 2,
      stopOnUnsafeInference: false,
    });
    expect(lenient.checkForLoops(context).loopDetected).toBe(false);
  });
});
