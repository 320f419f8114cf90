import { registerAs } from '@nestjs/config';

export interface GeminiConfig {
  apiKey: string;
  model: string;
}

export default registerAs(
  'gemini',
  (): GeminiConfig => ({
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || 'gemini-2.5-flash-lite-preview-06-17',
  }),
);
