/**
 * Domain port for language-model completions.
 *
 * The RAG orchestrator builds the full message list itself; providers only
 * forward it to the model and return the generated text.
 */
export type ChatRole = "system" | "user" | "assistant";

export interface ChatTurn {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatTurn[];
  maxTokens: number;
  temperature: number;
  signal?: AbortSignal;
}

export interface Completion {
  text: string;
  model: string;
  finishReason?: string;
}

export interface GenerationProvider {
  complete(request: CompletionRequest): Promise<Completion>;
}
