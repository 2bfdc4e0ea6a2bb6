export type Difficulty = "easy" | "medium" | "hard";

export const DIFFICULTIES: readonly Difficulty[] = ["easy", "medium", "hard"];

export type DifficultyCounts = Partial<Record<Difficulty, number>>;

export interface DocumentUnit {
  index: number;
  text: string;
}

export interface SourceDocument {
  id: string;
  title: string;
  filePath: string;
  importedAt: string;
  units: DocumentUnit[];
}

export interface DocumentStats {
  unitCount: number;
  totalChars: number;
  totalTokens: number;
  averageTokensPerUnit: number;
}

export type ChunkPolicy =
  | { kind: "unit" }
  | { kind: "window"; windowSizeTokens: number; overlapTokens: number };

export interface UnitBoundaryMarker {
  unitIndex: number;
  kind: "begin" | "end";
}

export interface Chunk {
  readonly id: number;
  readonly text: string;
  readonly tokenWeight: number;
  readonly sourceRefs: readonly number[];
  readonly boundaryMarkers?: readonly UnitBoundaryMarker[];
}

export interface AllocationEntry {
  chunkId: number;
  itemCount: number;
}

export type AllocationPlan = Record<Difficulty, readonly AllocationEntry[]>;

export interface ChunkedPlan {
  chunks: readonly Chunk[];
  plan: AllocationPlan;
}

/**
 * Stable identity of one generated item. Consumers key results on this,
 * never on completion order.
 */
export interface ItemIdentity {
  chunkId: number;
  difficulty: Difficulty;
  sequence: number;
}

export interface Notion {
  title: string;
  description: string;
  sourceRefs: number[];
  enabled: boolean;
}

export interface QuizQuestion {
  id: string;
  identity: ItemIdentity;
  question: string;
  choices: Record<string, string>;
  correctAnswers: string[];
  explanation: string;
  sourceRefs: number[];
}

export interface QuizMetadata {
  requestedCounts: DifficultyCounts;
  generatedCount: number;
  failedRequests: Array<{ chunkId: number; difficulty: Difficulty; reason: string }>;
  numChoices: number;
  numCorrect: number;
  model: string;
}

export interface Quiz {
  title: string;
  difficulties: Difficulty[];
  questions: QuizQuestion[];
  metadata: QuizMetadata;
}

export interface ExerciseCandidate {
  readonly statement: string;
  readonly claimedAnswer: string;
  readonly reasoningSteps: readonly string[];
  readonly verificationCode: string;
  readonly correction: string;
  readonly sourceChunk: number;
}

export type ModelErrorKind = "RateLimited" | "InvalidResponse" | "Timeout" | "Unavailable";

export type ExecutionErrorKind = "SyntaxError" | "RuntimeError" | "Timeout";

export type AttemptResult =
  | { type: "executed"; value: string; output: string[] }
  | { type: "execution_error"; errorKind: ExecutionErrorKind; message: string }
  | { type: "generation_error"; errorKind: ModelErrorKind; message: string };

export interface ComparisonResult {
  matched: boolean;
  kind: "numeric" | "text" | "no_match";
  detail: string;
}

export interface AttemptRecord {
  attempt: number;
  candidate: ExerciseCandidate | null;
  result: AttemptResult;
  comparison: ComparisonResult;
}

export type VerificationStatus = "Verified" | "Unverified" | "ExecutionError" | "Exhausted";

export interface VerificationOutcome {
  identity: ItemIdentity;
  candidate: ExerciseCandidate | null;
  status: VerificationStatus;
  attemptsUsed: number;
  executionTrace: readonly AttemptRecord[];
  sourceRefs: number[];
}

export interface LearningPack {
  id: string;
  title: string;
  sourceDocumentId: string;
  createdAt: string;
  cancelled: boolean;
  chunks: Array<{ id: number; tokenWeight: number; sourceRefs: number[] }>;
  notions: Notion[];
  quiz: Quiz;
  exercises: VerificationOutcome[];
}
