import type { SampleBuffer } from './audio-capture'

const BITS_PER_SAMPLE = 16
const HEADER_SIZE = 44

/**
 * 创建 WAV 文件头（PCM 格式）
 */
export function createWavHeader(dataLength: number, sampleRate: number, channels: number): Buffer {
  const header = Buffer.alloc(HEADER_SIZE)
  const byteRate = sampleRate * channels * (BITS_PER_SAMPLE / 8)
  const blockAlign = channels * (BITS_PER_SAMPLE / 8)

  header.write('RIFF', 0)
  header.writeUInt32LE(36 + dataLength, 4)
  header.write('WAVE', 8)
  header.write('fmt ', 12)
  header.writeUInt32LE(16, 16)
  header.writeUInt16LE(1, 20)
  header.writeUInt16LE(channels, 22)
  header.writeUInt32LE(sampleRate, 24)
  header.writeUInt32LE(byteRate, 28)
  header.writeUInt16LE(blockAlign, 32)
  header.writeUInt16LE(BITS_PER_SAMPLE, 34)
  header.write('data', 36)
  header.writeUInt32LE(dataLength, 40)

  return header
}

/**
 * 将采样编码为完整的 WAV 文件内容
 */
export function encodeWav(buffer: SampleBuffer): Buffer {
  const data = Buffer.alloc(buffer.samples.length * 2)
  for (let i = 0; i < buffer.samples.length; i++) {
    data.writeInt16LE(buffer.samples[i], i * 2)
  }
  return Buffer.concat([createWavHeader(data.length, buffer.sampleRate, buffer.channels), data])
}
