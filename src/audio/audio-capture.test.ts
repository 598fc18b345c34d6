import { describe, expect, it } from 'vitest'
import { CaptureError } from '../utils/errors'
import { FakeAudioDevice, pcmChunk, unavailableDevice } from '../testing/fakes'
import { AudioCapture, computeRmsLevel, type AudioCaptureOptions } from './audio-capture'

const OPTIONS: AudioCaptureOptions = { sampleRate: 16000, channels: 1, minDurationMs: 500 }

describe('AudioCapture', () => {
  it('returns samples with a duration derived from the sample count', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    expect(capture.isOpen()).toBe(true)
    device.current?.pushAudio(1000)
    const buffer = await capture.stop()

    expect(buffer.samples.length).toBe(16000)
    expect(buffer.durationMs).toBe(1000)
    expect(buffer.sampleRate).toBe(16000)
    expect(capture.isOpen()).toBe(false)
    expect(device.closes).toBe(1)
  })

  it('keeps audio flushed while the handle closes', async () => {
    const device = new FakeAudioDevice({ flushMsOnClose: 600 })
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    const buffer = await capture.stop()
    expect(buffer.durationMs).toBe(600)
  })

  it('counts frames rather than samples for stereo input', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, { ...OPTIONS, channels: 2 })

    await capture.start()
    device.current?.pushAudio(750)
    const buffer = await capture.stop()
    expect(buffer.samples.length).toBe(24000)
    expect(buffer.durationMs).toBe(750)
  })

  it('rejects too-short recordings after closing the handle', async () => {
    const device = new FakeAudioDevice({ flushMsOnClose: 300 })
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    await expect(capture.stop()).rejects.toMatchObject({ name: 'CaptureError', kind: 'too-short' })
    expect(device.closes).toBe(1)
    expect(capture.isOpen()).toBe(false)
  })

  it('closes a leftover handle before opening a new one', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    await capture.start()
    expect(device.opens).toBe(2)
    expect(device.closes).toBe(1)
    expect(device.maxConcurrent).toBe(1)
  })

  it('discards data from a previous handle', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    const first = device.handles[0]
    await capture.start()
    first.pushAudio(1000)
    device.current?.pushAudio(500)
    const buffer = await capture.stop()
    expect(buffer.durationMs).toBe(500)
  })

  it('cancels idempotently, including concurrent calls', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    await Promise.all([capture.cancel(), capture.cancel()])
    await capture.cancel()

    expect(device.handles[0].closeCalls).toBe(1)
    expect(device.closes).toBe(1)
    expect(capture.isOpen()).toBe(false)
  })

  it('swallows errors from a handle that fails to close', async () => {
    const device = new FakeAudioDevice()
    device.closeError = new Error('stream already broken')
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    await expect(capture.cancel()).resolves.toBeUndefined()
    expect(capture.isOpen()).toBe(false)
  })

  it('rejects stop when nothing is open', async () => {
    const capture = new AudioCapture(new FakeAudioDevice(), OPTIONS)
    await expect(capture.stop()).rejects.toMatchObject({ kind: 'device-unavailable' })
  })

  it('passes through device-unavailable from the device', async () => {
    const capture = new AudioCapture(unavailableDevice(), OPTIONS)
    await expect(capture.start()).rejects.toBeInstanceOf(CaptureError)
    expect(capture.isOpen()).toBe(false)
  })

  it('wraps unexpected open failures as device-unavailable', async () => {
    const device = new FakeAudioDevice()
    device.openError = new Error('permission denied')
    const capture = new AudioCapture(device, OPTIONS)

    await expect(capture.start()).rejects.toMatchObject({
      kind: 'device-unavailable',
      message: '无法打开录音设备：permission denied',
    })
  })

  it('keeps the session alive after a stream error', async () => {
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, OPTIONS)

    await capture.start()
    device.current?.pushAudio(800)
    device.current?.fail(new Error('device unplugged'))
    const buffer = await capture.stop()

    expect(buffer.durationMs).toBe(800)
    expect(device.closes).toBe(1)
  })

  it('reports the level of each chunk', async () => {
    const levels: number[] = []
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, { ...OPTIONS, onLevel: level => levels.push(level) })

    await capture.start()
    device.current?.pushAudio(10)
    await capture.cancel()
    expect(levels).toEqual([1000 / 32768])
  })

  it('carries an odd trailing byte into the next level reading', async () => {
    const levels: number[] = []
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, { ...OPTIONS, onLevel: level => levels.push(level) })

    await capture.start()
    // 1000 与 -16384 的小端字节，拆成 1 + 3 字节两块
    device.current?.pushBytes([0xe8])
    device.current?.pushBytes([0x03, 0x00, 0xc0])
    await capture.cancel()

    const quiet = 1000 / 32768
    expect(levels).toEqual([Math.sqrt((quiet * quiet + 0.25) / 2)])
  })

  it('starts level readings from a clean byte boundary after a restart', async () => {
    const levels: number[] = []
    const device = new FakeAudioDevice()
    const capture = new AudioCapture(device, { ...OPTIONS, onLevel: level => levels.push(level) })

    await capture.start()
    device.current?.pushBytes([0xff])
    await capture.cancel()
    await capture.start()
    device.current?.pushBytes([0x00, 0xc0])
    await capture.cancel()

    expect(levels).toEqual([0.5])
  })
})

describe('computeRmsLevel', () => {
  it('is zero for an empty chunk', () => {
    expect(computeRmsLevel(Buffer.alloc(0))).toBe(0)
  })

  it('equals the amplitude for a constant signal', () => {
    expect(computeRmsLevel(pcmChunk(5, { sampleRate: 16000, channels: 1 }, 16384))).toBe(0.5)
  })
})
