import { describe, expect, it } from 'vitest'
import { deferred } from '../testing/fakes'
import { Mailbox } from './mailbox'

describe('Mailbox', () => {
  it('handles messages one at a time in posting order', async () => {
    const log: string[] = []
    const gate = deferred<void>()
    const mailbox = new Mailbox<string>(async message => {
      log.push(`start:${message}`)
      if (message === 'a') await gate.promise
      log.push(`end:${message}`)
    })

    mailbox.post('a')
    mailbox.post('b')
    await Promise.resolve()
    expect(log).toEqual(['start:a'])

    gate.resolve()
    await mailbox.drain()
    expect(log).toEqual(['start:a', 'end:a', 'start:b', 'end:b'])
  })

  it('keeps going after a handler throws', async () => {
    const handled: number[] = []
    const mailbox = new Mailbox<number>(message => {
      if (message === 1) throw new Error('boom')
      handled.push(message)
    })

    mailbox.post(1)
    mailbox.post(2)
    await mailbox.drain()
    expect(handled).toEqual([2])
  })

  it('drains messages posted while draining', async () => {
    const handled: number[] = []
    const mailbox: Mailbox<number> = new Mailbox<number>(message => {
      handled.push(message)
      if (message < 3) mailbox.post(message + 1)
    })

    mailbox.post(1)
    await mailbox.drain()
    expect(handled).toEqual([1, 2, 3])
    expect(mailbox.size).toBe(0)
  })

  it('rejects posts after close but finishes queued work', async () => {
    const handled: string[] = []
    const mailbox = new Mailbox<string>(message => {
      handled.push(message)
    })

    expect(mailbox.post('queued')).toBe(true)
    mailbox.close()
    expect(mailbox.post('late')).toBe(false)
    await mailbox.drain()
    expect(handled).toEqual(['queued'])
    expect(mailbox.isClosed).toBe(true)
  })
})
