import { describe, expect, it, vi } from 'vitest'
import type { SampleBuffer } from '../audio/audio-capture'
import { FakeSink, FakeTranscriber } from '../testing/fakes'
import { MetricsCollector } from '../utils/metrics'
import { ProcessingPipeline, type TextCleaner } from './processing-pipeline'

function sampleBuffer(durationMs = 1000): SampleBuffer {
  const sampleRate = 16000
  return {
    samples: new Int16Array((sampleRate * durationMs) / 1000).fill(500),
    sampleRate,
    channels: 1,
    durationMs,
  }
}

const deliverAlways = { cleanupEnabled: false, shouldDeliver: () => true }

describe('ProcessingPipeline', () => {
  it('transcribes and delivers the raw text when cleanup is off', async () => {
    const transcriber = FakeTranscriber.returning('hello world')
    const sink = new FakeSink()
    const metrics = new MetricsCollector()
    const pipeline = new ProcessingPipeline({ transcriber, sink, metrics })

    const { result, timings } = await pipeline.run(1, sampleBuffer(), deliverAlways)

    expect(result).toEqual({
      kind: 'delivered',
      text: 'hello world',
      rawText: 'hello world',
      cleanupUsed: false,
      modelId: 'fake-model',
    })
    expect(sink.delivered).toEqual(['hello world'])
    expect(timings.totalMs).toBeGreaterThanOrEqual(0)
    expect(metrics.getStats('encode')?.count).toBe(1)
    expect(metrics.getStats('transcription')?.count).toBe(1)
    expect(metrics.getStats('delivery')?.count).toBe(1)
  })

  it('hands the transcriber a WAV file', async () => {
    const transcriber = FakeTranscriber.returning('hello')
    const pipeline = new ProcessingPipeline({ transcriber, sink: new FakeSink(), metrics: new MetricsCollector() })

    await pipeline.run(1, sampleBuffer(), deliverAlways)

    expect(transcriber.inputs).toHaveLength(1)
    expect(transcriber.inputs[0].toString('ascii', 0, 4)).toBe('RIFF')
    expect(transcriber.inputs[0].length).toBe(44 + 16000 * 2)
  })

  it('delivers the cleaned text when cleanup is enabled', async () => {
    const cleaner: TextCleaner = {
      clean: vi.fn(async (text: string) => ({ text: `${text.toUpperCase()}.`, engineUsed: true, durationMs: 3 })),
    }
    const sink = new FakeSink()
    const pipeline = new ProcessingPipeline({
      transcriber: FakeTranscriber.returning('hello world'),
      cleaner,
      sink,
      metrics: new MetricsCollector(),
    })

    const { result } = await pipeline.run(2, sampleBuffer(), { cleanupEnabled: true, shouldDeliver: () => true })

    expect(result).toMatchObject({ kind: 'delivered', text: 'HELLO WORLD.', rawText: 'hello world', cleanupUsed: true })
    expect(sink.delivered).toEqual(['HELLO WORLD.'])
  })

  it('ignores the cleaner when cleanup is disabled for the run', async () => {
    const clean = vi.fn(async (text: string) => ({ text: 'changed', engineUsed: true, durationMs: 0 }))
    const pipeline = new ProcessingPipeline({
      transcriber: FakeTranscriber.returning('as spoken'),
      cleaner: { clean },
      sink: new FakeSink(),
      metrics: new MetricsCollector(),
    })

    const { result } = await pipeline.run(1, sampleBuffer(), deliverAlways)
    expect(result).toMatchObject({ kind: 'delivered', text: 'as spoken' })
    expect(clean).not.toHaveBeenCalled()
  })

  it('skips a blank transcription', async () => {
    const sink = new FakeSink()
    const pipeline = new ProcessingPipeline({
      transcriber: FakeTranscriber.returning('   '),
      sink,
      metrics: new MetricsCollector(),
    })

    const { result } = await pipeline.run(1, sampleBuffer(), deliverAlways)
    expect(result).toEqual({ kind: 'skipped', reason: 'empty' })
    expect(sink.delivered).toEqual([])
  })

  it('reports a transcriber crash as engine-unavailable', async () => {
    const transcriber = new FakeTranscriber(async () => {
      throw new Error('boom')
    })
    const pipeline = new ProcessingPipeline({ transcriber, sink: new FakeSink(), metrics: new MetricsCollector() })

    const { result } = await pipeline.run(1, sampleBuffer(), deliverAlways)
    expect(result).toEqual({ kind: 'failed', error: { code: 'engine-unavailable', message: '转写失败: boom' } })
  })

  it('reports a sink failure as sink-unavailable', async () => {
    const sink = new FakeSink()
    sink.error = new Error('clipboard locked')
    const pipeline = new ProcessingPipeline({
      transcriber: FakeTranscriber.returning('hello'),
      sink,
      metrics: new MetricsCollector(),
    })

    const { result } = await pipeline.run(1, sampleBuffer(), deliverAlways)
    expect(result).toEqual({
      kind: 'failed',
      error: { code: 'sink-unavailable', message: '投递失败: clipboard locked' },
    })
  })

  it('does not deliver once the session is no longer current', async () => {
    const sink = new FakeSink()
    const pipeline = new ProcessingPipeline({
      transcriber: FakeTranscriber.returning('too late'),
      sink,
      metrics: new MetricsCollector(),
    })

    const { result } = await pipeline.run(1, sampleBuffer(), { cleanupEnabled: false, shouldDeliver: () => false })
    expect(result).toMatchObject({ kind: 'failed', error: { code: 'failsafe-triggered' } })
    expect(sink.delivered).toEqual([])
  })
})
