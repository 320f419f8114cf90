export interface ILlmClient {
  generate(prompt: string): Promise<string>;
}
