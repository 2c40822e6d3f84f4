/**
 * Story Pipeline
 *
 * Validate → Parse → Analyze → Transform → Generate, with a loop-detection
 * checkpoint after Parse (1), Analyze (2) and Transform (3). A detected
 * loop halts the pipeline at once; no later stage runs.
 *
 * Usage:
 * ```typescript
 * const pipeline = new StoryPipeline({ config: DEFAULT_CONFIG.story });
 * const result = pipeline.processIssue(issue);
 * if (!result.success) console.log(result.stopPhrase, result.reason);
 * ```
 */

import type { StoryConfig } from '../../types/config.js';
import { DEFAULT_CONFIG } from '../../types/config.js';
import { errorMessage } from '../errors.js';
import { DefaultIssueValidator } from './issue-validator.js';
import { MarkdownIssueParser } from './issue-parser.js';
import { ThresholdLoopDetector } from './loop-detector.js';
import { MarkdownOutputGenerator } from './output-generator.js';
import { buildProcessingContext } from './processing-context.js';
import { HeuristicRequirementsAnalyzer } from './requirements-analyzer.js';
import { EarsGherkinTransformer } from './requirements-transformer.js';
import type {
  AnalysisResult,
  CheckpointStage,
  IssueParser,
  IssueValidator,
  LoopDetectionResult,
  LoopDetector,
  OutputGenerator,
  ParsedIssue,
  PipelineStage,
  ProcessingResult,
  RequirementsAnalyzer,
  RequirementsTransformer,
  StopCause,
  StoryIssue,
  TransformedRequirements,
} from './types.js';

export const STOP_VALIDATION_FAILED = 'STOP: Validation failed';
export const STOP_PARSING_FAILED = 'STOP: Issue parsing failed';
export const STOP_PROCESSING_FAILED = 'STOP: Processing failed';
export const LOOP_FALLBACK_REASON = 'Loop condition detected';

const STAGE_LABELS: Record<CheckpointStage, string> = {
  parse: 'parsing',
  analyze: 'analysis',
  transform: 'transformation',
};

export interface StoryPipelineOptions {
  config?: StoryConfig;
  validator?: IssueValidator;
  parser?: IssueParser;
  analyzer?: RequirementsAnalyzer;
  transformer?: RequirementsTransformer;
  generator?: OutputGenerator;
  loopDetector?: LoopDetector;
  onProgress?: (message: string) => void;
}

/** Thrown internally to carry a stop out of a stage */
class PipelineStop extends Error {
  constructor(
    readonly stopPhrase: string,
    readonly reason: string,
    readonly stage: PipelineStage,
    readonly stopCause: StopCause
  ) {
    super(reason);
    this.name = 'PipelineStop';
  }
}

export class StoryPipeline {
  private config: StoryConfig;
  private validator: IssueValidator;
  private parser: IssueParser;
  private analyzer: RequirementsAnalyzer;
  private transformer: RequirementsTransformer;
  private generator: OutputGenerator;
  private loopDetector: LoopDetector;
  private onProgress?: (message: string) => void;

  constructor(options: StoryPipelineOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG.story;
    this.validator = options.validator ?? new DefaultIssueValidator(this.config);
    this.parser = options.parser ?? new MarkdownIssueParser();
    this.analyzer = options.analyzer ?? new HeuristicRequirementsAnalyzer();
    this.transformer = options.transformer ?? new EarsGherkinTransformer();
    this.generator = options.generator ?? new MarkdownOutputGenerator();
    this.loopDetector = options.loopDetector ?? new ThresholdLoopDetector(this.config);
    this.onProgress = options.onProgress;
  }

  /**
   * Run an issue through every stage. Never throws: stops and stage
   * failures are returned as results.
   */
  processIssue(issue: StoryIssue): ProcessingResult {
    try {
      return this.run(issue);
    } catch (error) {
      if (error instanceof PipelineStop) {
        this.onProgress?.(`Stopped at ${error.stage}: ${error.stopPhrase}`);
        return {
          success: false,
          output: null,
          stopPhrase: error.stopPhrase,
          reason: error.reason,
          stage: error.stage,
          cause: error.stopCause,
        };
      }
      return {
        success: false,
        output: null,
        stopPhrase: STOP_PROCESSING_FAILED,
        reason: errorMessage(error),
        stage: 'generate',
        cause: 'error',
      };
    }
  }

  private run(issue: StoryIssue): ProcessingResult {
    const validation = this.stage('validate', () => this.validator.validateIssue(issue));
    if (!validation.valid) {
      throw new PipelineStop(
        validation.stopPhrase ?? STOP_VALIDATION_FAILED,
        validation.reason ?? 'Unknown reason',
        'validate',
        'validation'
      );
    }

    const parsed = this.stage('parse', () => this.parser.parseIssue(issue));
    this.checkpoint('parse', parsed, null, null);

    const analysis = this.stage('analyze', () => this.analyzer.analyzeRequirements(parsed));
    this.checkpoint('analyze', parsed, analysis, null);

    const transformed = this.stage('transform', () =>
      this.transformer.transformRequirements(analysis, parsed)
    );
    this.checkpoint('transform', parsed, analysis, transformed);

    const output = this.stage('generate', () =>
      this.generator.generateOutput(transformed, issue.body)
    );

    this.onProgress?.(`Strengthened issue #${issue.number}`);
    return { success: true, output, stopPhrase: null, reason: null };
  }

  private stage<T>(stage: PipelineStage, run: () => T): T {
    try {
      return run();
    } catch (error) {
      if (error instanceof PipelineStop) {
        throw error;
      }
      throw new PipelineStop(
        stage === 'parse' ? STOP_PARSING_FAILED : STOP_PROCESSING_FAILED,
        errorMessage(error),
        stage,
        'error'
      );
    }
  }

  private checkpoint(
    stage: CheckpointStage,
    parsed: ParsedIssue,
    analysis: AnalysisResult | null,
    transformed: TransformedRequirements | null
  ): void {
    if (!this.config.enableLoopDetection) {
      return;
    }

    const context = buildProcessingContext(stage, parsed, analysis, transformed);
    let verdict: LoopDetectionResult;
    try {
      verdict = this.loopDetector.checkForLoops(context);
    } catch (error) {
      throw new PipelineStop(STOP_PROCESSING_FAILED, errorMessage(error), stage, 'error');
    }

    if (verdict.loopDetected) {
      throw new PipelineStop(
        withStopPrefix(verdict.stopPhrase) ||
          `STOP: Loop detected after ${STAGE_LABELS[stage]}`,
        verdict.reason || LOOP_FALLBACK_REASON,
        stage,
        'loop'
      );
    }
  }
}

function withStopPrefix(phrase: string | null): string {
  const trimmed = phrase?.trim() ?? '';
  if (!trimmed || trimmed.startsWith('STOP:')) {
    return trimmed;
  }
  return `STOP: ${trimmed}`;
}
