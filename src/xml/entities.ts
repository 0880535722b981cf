import { MalformedInputError } from '../errors.js'

const PREDEFINED: Record<string, string> = {
  amp: '&',
  apos: "'",
  gt: '>',
  lt: '<',
  quot: '"',
}

const REFERENCE = /&(#x[\dA-Fa-f]+|#\d+|[A-Z_a-z][\w.-]*);/y

function decodeCharacterReference(body: string): string {
  const codePoint = body.startsWith('#x')
    ? Number.parseInt(body.slice(2), 16)
    : Number.parseInt(body.slice(1), 10)
  if (!isXmlChar(codePoint)) {
    throw new MalformedInputError(`Invalid character reference &${body};`)
  }

  return String.fromCodePoint(codePoint)
}

function isXmlChar(codePoint: number): boolean {
  return (
    codePoint === 0x9 ||
    codePoint === 0xA ||
    codePoint === 0xD ||
    (codePoint >= 0x20 && codePoint <= 0xD7_FF) ||
    (codePoint >= 0xE0_00 && codePoint <= 0xFF_FD) ||
    (codePoint >= 0x1_00_00 && codePoint <= 0x10_FF_FF)
  )
}

/**
 * Walks every `&` in `text`, calling `onReference` with the reference body
 * (`amp`, `#38`, `#x26`). Throws when an ampersand does not start a
 * well-formed reference.
 */
function eachReference(text: string, onReference: (body: string, start: number, end: number) => void): void {
  let index = text.indexOf('&')
  while (index !== -1) {
    REFERENCE.lastIndex = index
    const match = REFERENCE.exec(text)
    if (!match) {
      throw new MalformedInputError(`Malformed entity reference near "${text.slice(index, index + 16)}"`)
    }

    onReference(match[1], index, REFERENCE.lastIndex)
    index = text.indexOf('&', REFERENCE.lastIndex)
  }
}

/**
 * Decodes an attribute value as an XML parser would: references are
 * resolved and literal tabs and line breaks become spaces.
 */
export function decodeAttributeValue(raw: string): string {
  const normalized = raw.replaceAll(/\r\n|[\t\n\r]/g, ' ')
  let decoded = ''
  let last = 0
  eachReference(normalized, (body, start, end) => {
    decoded += normalized.slice(last, start)
    if (body.startsWith('#')) {
      decoded += decodeCharacterReference(body)
    } else if (body in PREDEFINED) {
      decoded += PREDEFINED[body]
    } else {
      throw new MalformedInputError(`Undeclared entity &${body};`)
    }

    last = end
  })

  return decoded + normalized.slice(last)
}

/**
 * Checks the references inside raw character data without changing it.
 */
export function assertTextReferences(raw: string): void {
  eachReference(raw, (body) => {
    if (body.startsWith('#')) {
      decodeCharacterReference(body)
    } else if (!(body in PREDEFINED)) {
      throw new MalformedInputError(`Undeclared entity &${body};`)
    }
  })
}

/**
 * Escapes the five characters XML predefines entities for, and tabs and
 * line breaks as character references so attribute normalization keeps them.
 */
export function escapeAttributeValue(value: string): string {
  return value
    .replaceAll('&', '&amp;')
    .replaceAll('<', '&lt;')
    .replaceAll('>', '&gt;')
    .replaceAll('"', '&quot;')
    .replaceAll("'", '&apos;')
    .replaceAll('\t', '&#9;')
    .replaceAll('\n', '&#10;')
    .replaceAll('\r', '&#13;')
}
