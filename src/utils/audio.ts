import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import ffmpeg from 'fluent-ffmpeg';
import { parseBuffer } from 'music-metadata';

// ffmpegはPATH上のものを使う。設定で明示された場合のみ上書き
export function configureFfmpeg(ffmpegPath?: string): void {
  if (ffmpegPath) {
    ffmpeg.setFfmpegPath(ffmpegPath);
  }
}

// PCMデータをWAV形式に変換
export function pcmToWav(pcmBuffer: Buffer, sampleRate = 24000): Buffer {
  const numChannels = 1;
  const bitsPerSample = 16;
  const byteRate = sampleRate * numChannels * (bitsPerSample / 8);
  const blockAlign = numChannels * (bitsPerSample / 8);
  const dataSize = pcmBuffer.length;
  const headerSize = 44;
  const totalSize = headerSize + dataSize;

  const buffer = Buffer.alloc(totalSize);

  // RIFFヘッダー
  buffer.write('RIFF', 0);
  buffer.writeUInt32LE(totalSize - 8, 4);
  buffer.write('WAVE', 8);

  // fmtチャンク
  buffer.write('fmt ', 12);
  buffer.writeUInt32LE(16, 16);
  buffer.writeUInt16LE(1, 20); // PCM
  buffer.writeUInt16LE(numChannels, 22);
  buffer.writeUInt32LE(sampleRate, 24);
  buffer.writeUInt32LE(byteRate, 28);
  buffer.writeUInt16LE(blockAlign, 32);
  buffer.writeUInt16LE(bitsPerSample, 34);

  // dataチャンク
  buffer.write('data', 36);
  buffer.writeUInt32LE(dataSize, 40);
  pcmBuffer.copy(buffer, 44);

  return buffer;
}

const EXTENSION_BY_TYPE: Record<string, string> = {
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/mp4': 'm4a',
  'video/mp4': 'mp4',
  'audio/aac': 'aac',
  'audio/ogg': 'ogg',
  'audio/webm': 'webm',
};

export function isMp3(contentType: string): boolean {
  const type = contentType.split(';')[0]?.trim().toLowerCase();
  return type === 'audio/mpeg' || type === 'audio/mp3';
}

// 任意の音声バッファをMP3に変換
export async function convertToMp3(input: Buffer, contentType: string, tempDir: string): Promise<Buffer> {
  const type = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  const extension = EXTENSION_BY_TYPE[type] ?? 'bin';
  const id = randomUUID();
  const inputPath = path.join(tempDir, `convert_${id}.${extension}`);
  const outputPath = path.join(tempDir, `convert_${id}.mp3`);

  try {
    await fs.mkdir(tempDir, { recursive: true });
    await fs.writeFile(inputPath, input);

    await new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .audioCodec('libmp3lame')
        .audioQuality(2)
        .toFormat('mp3')
        .on('end', () => resolve())
        .on('error', (err) => reject(err))
        .save(outputPath);
    });

    return await fs.readFile(outputPath);
  } finally {
    await fs.rm(inputPath, { force: true });
    await fs.rm(outputPath, { force: true });
  }
}

// 音声バッファの再生時間（秒）を取得。解析できなければundefined
export async function getAudioDuration(data: Buffer, contentType = 'audio/mpeg'): Promise<number | undefined> {
  const metadata = await parseBuffer(data, { mimeType: contentType });
  const duration = metadata.format.duration;
  return duration === undefined ? undefined : Math.round(duration);
}

// 再生時間を HH:MM:SS（1時間未満は MM:SS）形式の文字列に変換
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;
  const mmss = `${minutes.toString().padStart(2, '0')}:${secs.toString().padStart(2, '0')}`;
  return hours > 0 ? `${hours}:${mmss}` : mmss;
}

// 複数のMP3バッファをffmpegで結合
export async function concatMp3Buffers(buffers: Buffer[], tempDir: string): Promise<Buffer> {
  if (buffers.length === 0) {
    return Buffer.alloc(0);
  }
  if (buffers.length === 1 && buffers[0]) {
    return buffers[0];
  }

  const id = randomUUID();
  const tempFiles: string[] = [];

  // ffmpegが正しくファイルを参照できるよう絶対パスにする
  const absoluteTempDir = path.resolve(tempDir);

  try {
    await fs.mkdir(absoluteTempDir, { recursive: true });

    for (let i = 0; i < buffers.length; i++) {
      const buffer = buffers[i];
      if (!buffer) continue;
      const tempPath = path.join(absoluteTempDir, `chunk_${id}_${i}.mp3`);
      await fs.writeFile(tempPath, buffer);
      tempFiles.push(tempPath);
    }

    const listPath = path.join(absoluteTempDir, `concat_${id}.txt`);
    const listContent = tempFiles.map((f) => `file '${f}'`).join('\n');
    const outputPath = path.join(absoluteTempDir, `output_${id}.mp3`);
    tempFiles.push(listPath, outputPath);
    await fs.writeFile(listPath, listContent);

    await new Promise<void>((resolve, reject) => {
      ffmpeg()
        .input(listPath)
        .inputOptions(['-f', 'concat', '-safe', '0'])
        .audioCodec('copy')
        .on('end', () => resolve())
        .on('error', (err) => reject(err))
        .save(outputPath);
    });

    return await fs.readFile(outputPath);
  } finally {
    for (const tempFile of tempFiles) {
      await fs.rm(tempFile, { force: true });
    }
  }
}
