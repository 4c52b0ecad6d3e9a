// packages/core/src/types/rules.ts

export interface TranslationRule {
  patterns: string[];
  /** Instruction text; `{modifier}` becomes `command` on macOS, `win` elsewhere. */
  instruction: string;
  macosInstruction?: string;
}

export interface IngestCandidate {
  thought: string;
  instruction: string;
  outcome: string;
  count: number;
}
