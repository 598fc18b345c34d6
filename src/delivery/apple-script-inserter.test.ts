import { describe, expect, it, vi } from 'vitest'
import { AppleScriptTextInserter, escapeAppleScriptText, type ScriptRunner } from './apple-script-inserter'

const noDelay = async () => undefined

describe('escapeAppleScriptText', () => {
  it('escapes quotes, backslashes and control characters', () => {
    expect(escapeAppleScriptText('say "hi"\\\n\tok')).toBe('say \\"hi\\"\\\\\\n\\tok')
  })
})

describe('AppleScriptTextInserter', () => {
  it('pastes through the clipboard and restores the previous content', async () => {
    const scripts: string[] = []
    const runScript = vi.fn<ScriptRunner>(async script => {
      scripts.push(script)
      return script === 'the clipboard as text' ? 'previous\n' : ''
    })
    const inserter = new AppleScriptTextInserter({ platform: 'darwin', runScript, delay: noDelay })

    await inserter.deliver('Hello "world".')

    expect(scripts).toEqual([
      'the clipboard as text',
      'set the clipboard to "Hello \\"world\\"."',
      'tell application "System Events" to keystroke "v" using command down',
      'set the clipboard to "previous"',
    ])
  })

  it('skips restoring when the clipboard could not be read', async () => {
    const scripts: string[] = []
    const runScript = vi.fn<ScriptRunner>(async script => {
      scripts.push(script)
      if (script === 'the clipboard as text') throw new Error('not text')
      return ''
    })
    const inserter = new AppleScriptTextInserter({ platform: 'darwin', runScript, delay: noDelay })

    await inserter.deliver('hi')

    expect(scripts).toHaveLength(3)
    expect(scripts[2]).toBe('tell application "System Events" to keystroke "v" using command down')
  })

  it('reports a failed paste and still restores the clipboard', async () => {
    const scripts: string[] = []
    const runScript = vi.fn<ScriptRunner>(async script => {
      scripts.push(script)
      if (script.startsWith('tell application')) throw new Error('not allowed')
      return script === 'the clipboard as text' ? 'previous' : ''
    })
    const inserter = new AppleScriptTextInserter({ platform: 'darwin', runScript, delay: noDelay })

    await expect(inserter.deliver('hi')).rejects.toMatchObject({
      kind: 'sink-unavailable',
      message: '粘贴失败: not allowed',
    })
    expect(scripts[scripts.length - 1]).toBe('set the clipboard to "previous"')
  })

  it('is unavailable outside macOS', async () => {
    const runScript = vi.fn<ScriptRunner>(async () => '')
    const inserter = new AppleScriptTextInserter({ platform: 'linux', runScript })

    await expect(inserter.deliver('hi')).rejects.toMatchObject({ kind: 'sink-unavailable' })
    expect(runScript).not.toHaveBeenCalled()
  })
})
