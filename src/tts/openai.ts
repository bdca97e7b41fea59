import OpenAI from 'openai';
import type { TTSProvider } from './index.js';
import { getLogger } from '../utils/logger.js';

export interface OpenAITTSConfig {
  apiKey: string;
  model: string;
  voices: string[];
}

const OPENAI_VOICES = ['alloy', 'echo', 'fable', 'onyx', 'nova', 'shimmer'] as const;
type OpenAIVoice = (typeof OPENAI_VOICES)[number];

function isOpenAIVoice(voice: string): voice is OpenAIVoice {
  return OPENAI_VOICES.some((v) => v === voice);
}

export class OpenAITTS implements TTSProvider {
  name = 'openai';
  availableVoices: string[];

  private client: OpenAI;
  private model: string;
  private logger = getLogger();

  constructor(config: OpenAITTSConfig) {
    this.client = new OpenAI({ apiKey: config.apiKey });
    this.model = config.model;
    this.availableVoices = config.voices.filter(isOpenAIVoice);
  }

  async generateAudio(text: string, options: { voice?: string; signal?: AbortSignal } = {}): Promise<Buffer> {
    const selectedVoice = this.resolveVoice(options.voice);
    this.logger.debug({ voice: selectedVoice, textLength: text.length }, 'OpenAI TTS生成開始');

    const response = await this.client.audio.speech.create(
      {
        model: this.model,
        voice: selectedVoice,
        input: text,
        response_format: 'mp3',
      },
      { signal: options.signal }
    );

    const mp3Buffer = Buffer.from(await response.arrayBuffer());

    this.logger.debug({ voice: selectedVoice, mp3Size: mp3Buffer.length }, 'OpenAI TTS生成完了');

    return mp3Buffer;
  }

  // 記事内で声が変わらないよう、先頭の声を既定にする
  private resolveVoice(voice?: string): OpenAIVoice {
    if (voice && isOpenAIVoice(voice)) {
      return voice;
    }
    const first = this.availableVoices[0];
    return first && isOpenAIVoice(first) ? first : 'nova';
  }
}
