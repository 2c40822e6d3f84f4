/**
 * Story strengthening pipeline types
 */

// ============================================================================
// Issue Types
// ============================================================================

export interface StoryIssue {
  number: number;
  title: string;
  body: string;
  labels: string[];
  repository: string;
}

export interface IssueSection {
  heading: string;
  content: string;
}

export interface ParsedIssue {
  number: number;
  title: string;
  labels: string[];
  repository: string;
  body: string;
  /** Heading-delimited sections, in document order */
  sections: IssueSection[];
}

export type IssueValidationResult =
  | { valid: true }
  | { valid: false; stopPhrase: string | null; reason: string | null };

// ============================================================================
// Analysis Types
// ============================================================================

export type EarsPattern = 'UBIQUITOUS' | 'STATE_DRIVEN' | 'EVENT_DRIVEN' | 'UNWANTED';

export interface Requirement {
  text: string;
  pattern: EarsPattern;
  /** False when the text leans on vague wording */
  verifiable: boolean;
}

export interface DataRequirement {
  fieldName: string;
  description: string;
  required: boolean;
}

export interface OpenQuestion {
  question: string;
  whyItMatters: string;
  impact: string;
}

export interface AnalysisResult {
  intent: string;
  actors: string[];
  stakeholders: string[];
  preconditions: Requirement[];
  functionalRequirements: Requirement[];
  errorFlows: Requirement[];
  businessRules: Requirement[];
  dataRequirements: DataRequirement[];
  ambiguities: OpenQuestion[];
}

// ============================================================================
// Transformation Types
// ============================================================================

export interface GherkinScenario {
  name: string;
  given: string[];
  when: string[];
  then: string[];
}

export interface TransformedRequirements {
  header: string;
  intent: string;
  actors: string[];
  /** EARS statements */
  preconditions: string[];
  functionalRequirements: string[];
  alternateFlows: string[];
  businessRules: string[];
  dataRequirements: string[];
  acceptanceCriteria: GherkinScenario[];
  observability: string[];
  openQuestions: OpenQuestion[];
}

// ============================================================================
// Loop Detection Types
// ============================================================================

export type CheckpointStage = 'parse' | 'analyze' | 'transform';
export type PipelineStage = 'validate' | CheckpointStage | 'generate';

export interface UnsafeInference {
  legal: boolean;
  financial: boolean;
  security: boolean;
  regulatory: boolean;
}

/**
 * Snapshot handed to the loop detector at each checkpoint
 */
export interface ProcessingContext {
  checkpoint: 1 | 2 | 3;
  stage: CheckpointStage;
  parsed: ParsedIssue;
  analysis: AnalysisResult | null;
  transformed: TransformedRequirements | null;
  /** Occurrences of each normalized section heading */
  sectionRewriteCounts: Readonly<Record<string, number>>;
  acceptanceCriteriaCount: number;
  openQuestionsCount: number;
  unsafeInference: UnsafeInference;
}

export interface LoopDetectionResult {
  loopDetected: boolean;
  /** Starts with "STOP:" when a loop is detected */
  stopPhrase: string | null;
  reason: string | null;
}

export type StopCause = 'validation' | 'loop' | 'error';

export type ProcessingResult =
  | { success: true; output: string; stopPhrase: null; reason: null }
  | {
      success: false;
      output: null;
      stopPhrase: string;
      reason: string;
      stage: PipelineStage;
      cause: StopCause;
    };

// ============================================================================
// Stage Contracts
// ============================================================================

export interface IssueValidator {
  validateIssue(issue: StoryIssue): IssueValidationResult;
}

export interface IssueParser {
  parseIssue(issue: StoryIssue): ParsedIssue;
}

export interface RequirementsAnalyzer {
  analyzeRequirements(parsed: ParsedIssue): AnalysisResult;
}

export interface RequirementsTransformer {
  transformRequirements(analysis: AnalysisResult, parsed: ParsedIssue): TransformedRequirements;
}

export interface OutputGenerator {
  generateOutput(transformed: TransformedRequirements, originalBody: string): string;
}

export interface LoopDetector {
  checkForLoops(context: ProcessingContext): LoopDetectionResult;
}
