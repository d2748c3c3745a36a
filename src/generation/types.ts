export interface GenerationRequest {
  /** Instruction placed in the system message */
  system?: string;
  prompt: string;
  /** Ask the model for a single JSON object */
  json?: boolean;
  maxTokens?: number;
  temperature?: number;
}

export interface TextGenerator {
  /**
   * Produce text for a prompt.
   * @throws GenerationError when the capability fails or returns no content
   */
  generate(request: GenerationRequest): Promise<string>;
  readonly model: string;
}
