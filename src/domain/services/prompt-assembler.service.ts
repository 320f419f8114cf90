import { Injectable } from '@nestjs/common';

export const DEFAULT_TOKEN_BUDGET = 1_000_000;
export const CHARS_PER_TOKEN = 4;

export const PROMPT_LABELS = {
  chatHistory: 'Chat history:',
  selectedArticle: 'Selected article:',
  similarArticles: 'Similar articles:',
  userMessage: 'User message:',
} as const;

export interface PromptInput {
  chatHistory: readonly string[];
  selectedArticle?: string;
  /** Most similar first. */
  similarArticles: readonly string[];
  userMessage?: string;
  tokenBudget?: number;
}

export interface AssembledPrompt {
  prompt: string;
  /** The similar articles that made it into the prompt, in input order. */
  similarArticles: string[];
  /** Articles dropped from the end of the list, least similar last. */
  droppedArticles: string[];
  estimatedTokens: number;
  withinBudget: boolean;
}

/**
 * Builds the chat prompt and drops the least similar articles until the
 * estimate fits the budget. Never mutates the caller's arrays.
 */
@Injectable()
export class PromptAssembler {
  estimateTokens(text: string): number {
    return Math.floor(text.length / CHARS_PER_TOKEN);
  }

  render(
    chatHistory: readonly string[],
    selectedArticle: string | undefined,
    similarArticles: readonly string[],
    userMessage: string | undefined,
  ): string {
    let prompt = '';
    if (chatHistory.length > 0) {
      prompt += `${PROMPT_LABELS.chatHistory}\n${chatHistory.join('\n')}\n`;
    }
    if (selectedArticle) {
      prompt += `${PROMPT_LABELS.selectedArticle}\n${selectedArticle}\n`;
    }
    if (similarArticles.length > 0) {
      prompt += `${PROMPT_LABELS.similarArticles}\n${similarArticles.join('\n')}\n`;
    }
    if (userMessage) {
      prompt += `${PROMPT_LABELS.userMessage}\n${userMessage}\n`;
    }
    return prompt;
  }

  assemble(input: PromptInput): AssembledPrompt {
    const budget = input.tokenBudget ?? DEFAULT_TOKEN_BUDGET;
    const kept = [...input.similarArticles];
    const dropped: string[] = [];

    let prompt = this.render(
      input.chatHistory,
      input.selectedArticle,
      kept,
      input.userMessage,
    );

    while (this.estimateTokens(prompt) > budget && kept.length > 0) {
      const removed = kept.pop();
      if (removed !== undefined) dropped.unshift(removed);
      prompt = this.render(
        input.chatHistory,
        input.selectedArticle,
        kept,
        input.userMessage,
      );
    }

    const estimatedTokens = this.estimateTokens(prompt);
    return {
      prompt,
      similarArticles: kept,
      droppedArticles: dropped,
      estimatedTokens,
      withinBudget: estimatedTokens <= budget,
    };
  }
}
