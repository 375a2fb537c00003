import { GoogleGenAI } from "@google/genai";
import { VisionClassifier } from "../types/contracts.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";

export function sniffImageMime(bytes: Buffer): string {
  if (bytes.length >= 8 && bytes.subarray(0, 8).equals(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]))) return "image/png";
  if (bytes.length >= 12 && bytes.toString("ascii", 0, 4) === "RIFF" && bytes.toString("ascii", 8, 12) === "WEBP") return "image/webp";
  return "image/jpeg";
}

/**
 * Gemini vision model. Returns the model's raw text; interpreting it is the
 * triage gate's job.
 */
export class GeminiClassifier implements VisionClassifier {
  private ai: GoogleGenAI;
  readonly model: string;

  constructor(args: { apiKey: string; model?: string }) {
    this.ai = new GoogleGenAI({ apiKey: args.apiKey });
    this.model = args.model || DEFAULT_GEMINI_MODEL;
  }

  async classify(image: Buffer, instructions: string): Promise<string> {
    const response = await this.ai.models.generateContent({
      model: this.model,
      contents: [
        {
          role: "user",
          parts: [
            { text: instructions },
            { inlineData: { mimeType: sniffImageMime(image), data: image.toString("base64") } }
          ]
        }
      ],
      config: {
        responseMimeType: "application/json",
        temperature: 0
      }
    });

    const text = response.text;
    if (!text) throw new Error("empty response from vision model");
    return text;
  }
}
