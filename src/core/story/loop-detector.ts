import type {
  LoopDetectionResult,
  LoopDetector,
  ProcessingContext,
  UnsafeInference,
} from './types.js';

export interface ThresholdLoopDetectorOptions {
  maxRewriteIterations: number;
  maxAcceptanceCriteria: number;
  maxOpenQuestions: number;
  stopOnUnsafeInference: boolean;
}

export const NO_LOOP: LoopDetectionResult = Object.freeze({
  loopDetected: false,
  stopPhrase: null,
  reason: null,
});

/**
 * Stops the pipeline when the story stops converging: a section appears
 * more often than the rewrite limit, the scenario or open-question counts
 * exceed their limits, or the story needs legal, financial, security or
 * regulatory judgement.
 */
export class ThresholdLoopDetector implements LoopDetector {
  constructor(private options: ThresholdLoopDetectorOptions) {}

  checkForLoops(context: ProcessingContext): LoopDetectionResult {
    const { maxRewriteIterations, maxAcceptanceCriteria, maxOpenQuestions } = this.options;

    for (const [section, count] of Object.entries(context.sectionRewriteCounts)) {
      if (count > maxRewriteIterations) {
        return detected(
          'STOP: Section rewrite limit exceeded',
          `Section '${section}' rewritten ${count} times (limit ${maxRewriteIterations})`
        );
      }
    }

    if (context.acceptanceCriteriaCount > maxAcceptanceCriteria) {
      return detected(
        'STOP: Too many acceptance criteria',
        `${context.acceptanceCriteriaCount} acceptance criteria exceed the limit of ${maxAcceptanceCriteria}`
      );
    }

    if (context.openQuestionsCount > maxOpenQuestions) {
      return detected(
        'STOP: Too many open questions',
        `${context.openQuestionsCount} open questions exceed the limit of ${maxOpenQuestions}`
      );
    }

    if (this.options.stopOnUnsafeInference) {
      const topics = unsafeTopics(context.unsafeInference);
      if (topics.length > 0) {
        return detected(
          'STOP: Requires human expertise',
          `Story requires ${topics.join(', ')} inference`
        );
      }
    }

    return NO_LOOP;
  }
}

function detected(stopPhrase: string, reason: string): LoopDetectionResult {
  return { loopDetected: true, stopPhrase, reason };
}

function unsafeTopics(flags: UnsafeInference): string[] {
  const topics: Array<keyof UnsafeInference> = ['legal', 'financial', 'security', 'regulatory'];
  return topics.filter((topic) => flags[topic]);
}
