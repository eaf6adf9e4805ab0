export interface GenerationPrompt {
  instruction: string;
  context: string;
  question: string;
}

export interface Generator {
  generate(prompt: GenerationPrompt, signal?: AbortSignal): Promise<string>;
  testConnection(): Promise<boolean>;
}
