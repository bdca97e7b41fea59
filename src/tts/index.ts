import { GeminiTTS } from './gemini.js';
import { OpenAITTS } from './openai.js';

// TTSプロバイダーインターフェース
export interface TTSProvider {
  name: string;
  availableVoices: string[];
  // MP3バッファを返す
  generateAudio(text: string, options?: { voice?: string; signal?: AbortSignal }): Promise<Buffer>;
}

// TTS設定
export interface TTSConfig {
  provider: 'gemini' | 'openai';
  model: string;
  voices: string[];
  apiKey?: string;
  speakerPrompt?: string;
  tempDir: string;
}

// TTSプロバイダーを作成
export function createTTSProvider(config: TTSConfig): TTSProvider {
  if (config.provider === 'gemini') {
    const apiKey = config.apiKey ?? process.env.GEMINI_API_KEY;
    if (!apiKey) {
      throw new Error('Gemini TTSのAPIキーが設定されていません (GEMINI_API_KEY)');
    }
    return new GeminiTTS({
      apiKey,
      model: config.model,
      voices: config.voices,
      speakerPrompt: config.speakerPrompt,
      tempDir: config.tempDir,
    });
  }

  const apiKey = config.apiKey ?? process.env.OPENAI_API_KEY;
  if (!apiKey) {
    throw new Error('OpenAI TTSのAPIキーが設定されていません (OPENAI_API_KEY)');
  }
  return new OpenAITTS({
    apiKey,
    model: config.model,
    voices: config.voices,
  });
}

export { GeminiTTS } from './gemini.js';
export { OpenAITTS } from './openai.js';
