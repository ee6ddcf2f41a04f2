export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type ModelCandidate = {
  provider: string;
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
};

export type ModelAttempt = {
  candidate: ModelCandidate;
  attemptIndex: number;
};

export type CompletionRequest = {
  candidate: ModelCandidate;
  messages: ChatMessage[];
};

export type Completion = {
  content: string;
  totalTokens: number;
};

/**
 * Text from the first model that answered; immutable once received.
 */
export type RawOutput = {
  rawText: string;
  modelUsed: string;
  provider: string;
  tokenCount: number;
  elapsedMs: number;
};

export type ModelProbe = {
  model: string;
  provider: string;
  available: boolean;
  elapsedMs: number;
  error?: string;
};
