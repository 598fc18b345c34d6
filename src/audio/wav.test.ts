import { describe, expect, it } from 'vitest'
import { createWavHeader, encodeWav } from './wav'

describe('createWavHeader', () => {
  it('writes a 44-byte PCM header', () => {
    const header = createWavHeader(32000, 16000, 1)
    expect(header.length).toBe(44)
    expect(header.toString('ascii', 0, 4)).toBe('RIFF')
    expect(header.readUInt32LE(4)).toBe(36 + 32000)
    expect(header.toString('ascii', 8, 12)).toBe('WAVE')
    expect(header.readUInt16LE(20)).toBe(1)
    expect(header.readUInt16LE(22)).toBe(1)
    expect(header.readUInt32LE(24)).toBe(16000)
    expect(header.readUInt32LE(28)).toBe(32000)
    expect(header.readUInt16LE(32)).toBe(2)
    expect(header.readUInt16LE(34)).toBe(16)
    expect(header.toString('ascii', 36, 40)).toBe('data')
    expect(header.readUInt32LE(40)).toBe(32000)
  })

  it('accounts for channels in byte rate and block align', () => {
    const header = createWavHeader(0, 44100, 2)
    expect(header.readUInt32LE(28)).toBe(176400)
    expect(header.readUInt16LE(32)).toBe(4)
  })
})

describe('encodeWav', () => {
  it('appends little-endian samples after the header', () => {
    const wav = encodeWav({ samples: Int16Array.from([1, -2, 32767]), sampleRate: 16000, channels: 1, durationMs: 0 })
    expect(wav.length).toBe(50)
    expect(wav.readUInt32LE(40)).toBe(6)
    expect([wav.readInt16LE(44), wav.readInt16LE(46), wav.readInt16LE(48)]).toEqual([1, -2, 32767])
  })
})
