import { GoogleGenerativeAI } from '@google/generative-ai';

import { AdvisorConfig } from '../config/env';

export interface TextGenerator {
  readonly model: string;
  generate(prompt: string): Promise<string>;
}

export class GeminiTextGenerator implements TextGenerator {
  readonly model: string;
  private readonly gemini: GoogleGenerativeAI;
  private readonly timeoutMs: number;

  constructor(apiKey: string, config: Pick<AdvisorConfig, 'model' | 'timeoutMs'>) {
    this.gemini = new GoogleGenerativeAI(apiKey);
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
  }

  async generate(prompt: string): Promise<string> {
    const model = this.gemini.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
    const result = await model.generateContent(prompt);
    return result.response.text();
  }
}
