import { describe, expect, it } from 'vitest'
import { MetricsCollector } from './metrics'

describe('MetricsCollector', () => {
  it('aggregates measured durations per operation', async () => {
    let clock = 1000
    const collector = new MetricsCollector(() => clock)

    await collector.measure('transcription', async () => {
      clock += 40
      return 'a'
    })
    const second = await collector.measure('transcription', async () => {
      clock += 20
      return 'b'
    })

    expect(second).toEqual({ value: 'b', duration: 20 })
    expect(collector.getStats('transcription')).toMatchObject({
      count: 2,
      totalDuration: 60,
      avgDuration: 30,
      minDuration: 20,
      maxDuration: 40,
    })
    expect(collector.getStats('cleanup')).toBeNull()
  })

  it('records failed operations and rethrows', async () => {
    let clock = 0
    const collector = new MetricsCollector(() => clock)

    await expect(
      collector.measure('delivery', async () => {
        clock += 5
        throw new Error('sink down')
      })
    ).rejects.toThrow('sink down')

    expect(collector.getStats('delivery')).toMatchObject({ count: 1, totalDuration: 5 })
  })

  it('returns the failed metric from endTimer', () => {
    let clock = 0
    const collector = new MetricsCollector(() => clock)
    const id = collector.startTimer('delivery')
    clock = 5

    expect(collector.endTimer(id, 'delivery', { failed: true })).toEqual({
      operation: 'delivery',
      startTime: 0,
      duration: 5,
      metadata: { failed: true },
    })
    expect(collector.endTimer(id, 'delivery')).toBeNull()
  })

  it('keeps overlapping timers of the same operation apart', () => {
    let clock = 100
    const collector = new MetricsCollector(() => clock)

    const first = collector.startTimer('transcription')
    clock = 300
    const stale = collector.startTimer('transcription')
    collector.endTimer(first, 'transcription')
    // 同一毫秒内再开一个，活动计时器数量与 stale 开始时相同
    const fresh = collector.startTimer('transcription')
    clock = 350

    expect(fresh).not.toBe(stale)
    expect(collector.endTimer(fresh, 'transcription')?.duration).toBe(50)
    expect(collector.endTimer(stale, 'transcription')?.duration).toBe(50)
    expect(collector.getStats('transcription')?.count).toBe(3)
  })
})
