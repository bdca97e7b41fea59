import { GoogleGenAI } from '@google/genai';
import type { TTSProvider } from './index.js';
import { pcmToWav, convertToMp3 } from '../utils/audio.js';
import { getLogger } from '../utils/logger.js';

export interface GeminiTTSConfig {
  apiKey: string;
  model: string;
  voices: string[];
  speakerPrompt?: string;
  tempDir: string;
}

export class GeminiTTS implements TTSProvider {
  name = 'gemini';
  availableVoices: string[];

  private client: GoogleGenAI;
  private model: string;
  private speakerPrompt?: string;
  private tempDir: string;
  private logger = getLogger();

  constructor(config: GeminiTTSConfig) {
    this.client = new GoogleGenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.availableVoices = config.voices;
    this.speakerPrompt = config.speakerPrompt;
    this.tempDir = config.tempDir;
  }

  async generateAudio(text: string, options: { voice?: string; signal?: AbortSignal } = {}): Promise<Buffer> {
    const selectedVoice = options.voice ?? this.availableVoices[0] ?? 'Kore';
    this.logger.debug({ voice: selectedVoice, textLength: text.length }, 'Gemini TTS生成開始');

    // speakerPromptがある場合、テキストの前に付与して話し方のトーンを指示する
    const promptedText = this.speakerPrompt ? `${this.speakerPrompt}\n\n${text}` : text;

    const response = await this.client.models.generateContent({
      model: this.model,
      contents: [{ parts: [{ text: promptedText }] }],
      config: {
        abortSignal: options.signal,
        responseModalities: ['AUDIO'],
        speechConfig: {
          voiceConfig: {
            prebuiltVoiceConfig: { voiceName: selectedVoice },
          },
        },
      },
    });

    const part = response.candidates?.[0]?.content?.parts?.[0];
    const audioData = part?.inlineData?.data;
    if (!audioData) {
      throw new Error('Gemini TTSから音声データが取得できませんでした');
    }

    // PCM → WAV → MP3
    const wavBuffer = pcmToWav(Buffer.from(audioData, 'base64'));
    const mp3Buffer = await convertToMp3(wavBuffer, 'audio/wav', this.tempDir);

    this.logger.debug({ voice: selectedVoice, mp3Size: mp3Buffer.length }, 'Gemini TTS生成完了');

    return mp3Buffer;
  }
}
