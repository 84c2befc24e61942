import { GoogleGenerativeAI } from '@google/generative-ai';
import { ImageOracle } from './types';
import { UpstreamError } from '../resilience/errors';

/** Gemini vision model behind the ImageOracle contract */
export class GeminiImageOracle implements ImageOracle {
  private genAI: GoogleGenerativeAI;

  constructor(
    apiKey: string,
    private readonly model: string,
  ) {
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async analyze(image: Buffer, mimeType: string, prompt: string): Promise<string> {
    const model = this.genAI.getGenerativeModel({
      model: this.model,
      generationConfig: { temperature: 0.2, responseMimeType: 'application/json' },
    });

    const result = await model.generateContent([
      prompt,
      { inlineData: { data: image.toString('base64'), mimeType } },
    ]);

    const text = result.response.text();
    if (!text) {
      throw new UpstreamError('Gemini vision returned empty response', 'vision');
    }
    return text;
  }
}
