/**
 * 本地确定性格式化
 *
 * 清理引擎不可用或输出不合规时的兜底：去掉口头禅和重复词，
 * 修正大小写并补全句末标点
 */

const FILLER_PATTERNS: RegExp[] = [
  /\b(?:um+|uh+|er+|ah+)\b/gi,
  /\b(?:like,\s*)+/gi,
  /\b(?:you know,?\s*)+/gi,
  /\b(?:basically,?\s*)+/gi,
  /\b(?:actually,?\s*)+/gi,
  /\b(?:literally,?\s*)+/gi,
  /\b(?:I mean,?\s*)+/gi,
  /\b(?:kind of|kinda)\s+/gi,
  /\b(?:sort of|sorta)\s+/gi,
]

export function removeFillers(text: string): string {
  return FILLER_PATTERNS.reduce((current, pattern) => current.replace(pattern, ' '), text)
}

/**
 * 合并连续重复的单词（"the the" -> "the"）
 */
export function collapseStutters(text: string): string {
  return text.replace(/\b(\w+)(?:\s+\1\b)+/gi, '$1')
}

function tidyPunctuation(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/\s+([,.!?;:])/g, '$1')
    .replace(/([,;:])(?:\s*[,;:])+/g, '$1')
    .replace(/,([.!?])/g, '$1')
    .trim()
}

function capitalize(text: string): string {
  return text
    .replace(/\bi\b/g, 'I')
    .replace(/(^|[.!?]\s+)([a-z])/g, (_match, prefix: string, letter: string) => prefix + letter.toUpperCase())
}

/**
 * 格式化转写文本；空白输入原样返回空字符串
 */
export function formatTranscript(text: string): string {
  let cleaned = collapseStutters(removeFillers(text))
  cleaned = tidyPunctuation(cleaned)
  // 去掉口头禅后残留的开头标点
  cleaned = cleaned.replace(/^[\s,;:.!?]+/, '').trim()
  if (!cleaned) return ''

  cleaned = capitalize(cleaned).replace(/[,;:]+$/, '')
  if (!/[.!?]["')\]]?$/.test(cleaned)) {
    cleaned += '.'
  }
  return cleaned
}

export function countWords(text: string): number {
  const trimmed = text.trim()
  return trimmed ? trimmed.split(/\s+/).length : 0
}
