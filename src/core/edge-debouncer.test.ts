import { describe, expect, it } from 'vitest'
import { EdgeDebouncer } from './edge-debouncer'

describe('EdgeDebouncer', () => {
  it('drops a second press 10ms after the first', () => {
    const debouncer = new EdgeDebouncer(100)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
    expect(debouncer.accept({ type: 'pressed', timestamp: 10 })).toBe(false)
  })

  it('accepts two presses 200ms apart', () => {
    const debouncer = new EdgeDebouncer(100)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
    expect(debouncer.accept({ type: 'pressed', timestamp: 200 })).toBe(true)
  })

  it('never drops a release that follows a press', () => {
    const debouncer = new EdgeDebouncer(100)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
    expect(debouncer.accept({ type: 'released', timestamp: 5 })).toBe(true)
    expect(debouncer.accept({ type: 'pressed', timestamp: 8 })).toBe(true)
  })

  it('measures the window from the last accepted edge, not the last dropped one', () => {
    const debouncer = new EdgeDebouncer(100)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
    expect(debouncer.accept({ type: 'pressed', timestamp: 60 })).toBe(false)
    expect(debouncer.accept({ type: 'pressed', timestamp: 120 })).toBe(true)
  })

  it('treats an edge exactly at the window boundary as accepted', () => {
    const debouncer = new EdgeDebouncer(100)
    debouncer.accept({ type: 'released', timestamp: 0 })
    expect(debouncer.accept({ type: 'released', timestamp: 100 })).toBe(true)
  })

  it('passes everything through with a zero window', () => {
    const debouncer = new EdgeDebouncer(0)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
    expect(debouncer.accept({ type: 'pressed', timestamp: 0 })).toBe(true)
  })
})
