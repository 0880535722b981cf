import { TextDecoder } from 'node:util'
import type { RawEvent, StartTagEvent, XmlAttribute, XmlEvent } from '../types.js'

import { MalformedInputError } from '../errors.js'
import { assertTextReferences, decodeAttributeValue } from './entities.js'

const NAME = /^[\p{L}:_][\p{L}\p{N}·:_.-]*$/u
const ATTRIBUTE = /\s+([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/y

type TokenKind = 'end' | 'start' | RawEvent['kind']

interface Delimited {
  kind: TokenKind
  open: string
  close: string
}

const DELIMITED: Delimited[] = [
  { close: '-->', kind: 'comment', open: '<!--' },
  { close: ']]>', kind: 'cdata', open: '<![CDATA[' },
  { close: '?>', kind: 'instruction', open: '<?' },
]

const DOCTYPE_OPEN = '<!DOCTYPE'

/**
 * Incremental, forward-only XML tokenizer.
 *
 * Text is pushed in with `write` and complete tokens come back as events;
 * only the unfinished tail of the input is kept between calls. Joining the
 * `raw` field of every event reproduces the input exactly, which is what lets
 * callers copy a subtree without re-serializing it.
 *
 * Well-formedness is checked as the tokens go by (tag nesting, one root,
 * names, attributes, references); the first problem throws a
 * {@link MalformedInputError}.
 */
export class XmlTokenizer {
  private buffer = ''
  private consumed = 0
  private ended = false
  // resume point of an unfinished token, relative to its start
  private resume = 0
  private rootClosed = false
  private rootSeen = false
  private scanState: string | undefined
  private readonly stack: string[] = []

  end(): XmlEvent[] {
    if (this.ended) return []
    const events = this.drain(true)
    this.ended = true

    if (this.stack.length > 0) {
      this.fail(`Unexpected end of input: <${this.stack.at(-1)}> is not closed`)
    }

    if (!this.rootSeen) {
      this.fail('XML input is empty or contains no elements')
    }

    return events
  }

  write(chunk: string): XmlEvent[] {
    if (this.ended) {
      throw new Error('Cannot write to a tokenizer after end()')
    }

    this.buffer += chunk
    return this.drain(false)
  }

  private classify(kind: TokenKind, raw: string): XmlEvent {
    switch (kind) {
      case 'cdata': {
        if (this.stack.length === 0) this.fail('CDATA section outside the root element')
        return { kind, raw }
      }

      case 'doctype': {
        if (this.rootSeen) this.fail('DOCTYPE after the root element')
        return { kind, raw }
      }

      case 'end': {
        const name = raw.slice(2, -1).trimEnd()
        if (!NAME.test(name)) this.fail(`Invalid end tag ${raw}`)
        const open = this.stack.pop()
        if (open === undefined) this.fail(`Unexpected end tag </${name}>`)
        if (open !== name) this.fail(`End tag </${name}> does not match <${open}>`)
        if (this.stack.length === 0) this.rootClosed = true
        return { kind, name, raw }
      }

      case 'start': {
        if (this.rootClosed) this.fail('Content after the root element')
        const event = this.parseStartTag(raw)
        this.rootSeen = true
        if (event.selfClosing) {
          if (this.stack.length === 0) this.rootClosed = true
        } else {
          this.stack.push(event.name)
        }

        return event
      }

      default: {
        return { kind, raw }
      }
    }
  }

  /**
   * Consumes every complete token in the buffer. With `final` set, an
   * unfinished token is an error instead of a reason to wait.
   */
  private drain(final: boolean): XmlEvent[] {
    const events: XmlEvent[] = []
    const text = this.buffer
    let pos = 0

    while (pos < text.length) {
      if (text[pos] !== '<') {
        const next = text.indexOf('<', pos)
        let end = next
        if (next === -1) {
          end = final ? text.length : safeTextEnd(text, pos)
          if (end === pos) break
        }

        events.push(this.text(text.slice(pos, end), pos))
        pos = end
        continue
      }

      const token = this.findTokenEnd(text, pos, final)
      if (!token) break

      events.push(this.classify(token.kind, text.slice(pos, token.end)))
      this.resume = 0
      this.scanState = undefined
      pos = token.end
    }

    this.buffer = text.slice(pos)
    this.consumed += pos
    if (final && this.buffer.length > 0) {
      this.fail(`Unterminated markup "${this.buffer.slice(0, 32)}"`)
    }

    return events
  }

  private fail(message: string, position = 0): never {
    throw new MalformedInputError(message, { offset: this.consumed + position })
  }

  private findTokenEnd(text: string, pos: number, final: boolean): undefined | { end: number; kind: TokenKind } {
    const head = text.slice(pos, pos + DOCTYPE_OPEN.length)

    for (const delimited of DELIMITED) {
      if (head.startsWith(delimited.open)) {
        const from = pos + Math.max(delimited.open.length, this.resume)
        const close = text.indexOf(delimited.close, from)
        if (close === -1) {
          this.resume = Math.max(delimited.open.length, text.length - pos - delimited.close.length + 1)
          return undefined
        }

        return { end: close + delimited.close.length, kind: delimited.kind }
      }
    }

    if (head === DOCTYPE_OPEN) {
      return this.scanDoctype(text, pos)
    }

    if (head.startsWith('<!')) {
      const couldGrow = head.length < DOCTYPE_OPEN.length && ['<!--', '<![CDATA[', DOCTYPE_OPEN].some((open) => open.startsWith(head))
      if (couldGrow && !final) return undefined
      this.fail(`Unsupported markup "${head}"`, pos)
    }

    if (head.length < 2) return undefined

    if (head[1] === '/') {
      const close = text.indexOf('>', pos + Math.max(2, this.resume))
      if (close === -1) {
        this.resume = text.length - pos
        return undefined
      }

      return { end: close + 1, kind: 'end' }
    }

    return this.scanStartTag(text, pos)
  }

  private parseStartTag(raw: string): StartTagEvent {
    let body = raw.slice(1, -1)
    const selfClosing = body.endsWith('/')
    if (selfClosing) body = body.slice(0, -1)

    const name = /^\S+/.exec(body)?.[0] ?? ''
    if (!NAME.test(name)) this.fail(`Invalid element name in ${raw.slice(0, 64)}`)

    const rest = body.slice(name.length)
    const attributes: XmlAttribute[] = []
    const seen = new Set<string>()
    ATTRIBUTE.lastIndex = 0
    while (ATTRIBUTE.lastIndex < rest.length) {
      if (rest.slice(ATTRIBUTE.lastIndex).trim() === '') break
      const match = ATTRIBUTE.exec(rest)
      if (!match) this.fail(`Malformed attributes in <${name}>`)

      const attributeName = match[1]
      if (!NAME.test(attributeName)) this.fail(`Invalid attribute name "${attributeName}" in <${name}>`)
      if (seen.has(attributeName)) this.fail(`Duplicate attribute "${attributeName}" in <${name}>`)
      seen.add(attributeName)

      attributes.push({
        name: attributeName,
        value: decodeAttributeValue(match[2] ?? match[3]),
      })
    }

    return { attributes, kind: 'start', name, raw, selfClosing }
  }

  private scanDoctype(text: string, pos: number): undefined | { end: number; kind: TokenKind } {
    let inSubset = this.scanState === '['
    for (let i = pos + Math.max(DOCTYPE_OPEN.length, this.resume); i < text.length; i++) {
      const char = text[i]
      if (char === '[') {
        inSubset = true
      } else if (char === ']') {
        inSubset = false
      } else if (char === '>' && !inSubset) {
        return { end: i + 1, kind: 'doctype' }
      }
    }

    this.resume = text.length - pos
    this.scanState = inSubset ? '[' : undefined
    return undefined
  }

  private scanStartTag(text: string, pos: number): undefined | { end: number; kind: TokenKind } {
    let quote = this.scanState
    for (let i = pos + Math.max(1, this.resume); i < text.length; i++) {
      const char = text[i]
      if (char === '<') {
        this.fail(quote ? 'Attribute value contains "<"' : 'Unterminated start tag', pos)
      }

      if (quote) {
        if (char === quote) quote = undefined
      } else if (char === '"' || char === "'") {
        quote = char
      } else if (char === '>') {
        return { end: i + 1, kind: 'start' }
      }
    }

    this.resume = text.length - pos
    this.scanState = quote
    return undefined
  }

  private text(raw: string, pos: number): RawEvent {
    if (this.stack.length === 0) {
      if (raw.trim() !== '') this.fail('Text outside the root element', pos)
    } else {
      try {
        assertTextReferences(raw)
      } catch (error) {
        if (error instanceof MalformedInputError) this.fail(error.message, pos)
        throw error
      }
    }

    return { kind: 'text', raw }
  }
}

/**
 * End of the text that can be emitted before more input arrives: a trailing
 * `&` without its `;` may be the start of a reference split across chunks.
 */
function safeTextEnd(text: string, pos: number): number {
  const ampersand = text.lastIndexOf('&')
  if (ampersand >= pos && !text.includes(';', ampersand)) return ampersand
  return text.length
}

function decode(decoder: TextDecoder, chunk?: Uint8Array): string {
  try {
    return chunk ? decoder.decode(chunk, { stream: true }) : decoder.decode()
  } catch (error) {
    throw new MalformedInputError('Input is not valid UTF-8', undefined, { cause: error })
  }
}

/**
 * Tokenizes a byte or text stream, decoding UTF-8 on the way.
 */
export async function* tokenize(source: AsyncIterable<string | Uint8Array>): AsyncGenerator<XmlEvent> {
  const decoder = new TextDecoder('utf-8', { fatal: true })
  const tokenizer = new XmlTokenizer()

  for await (const chunk of source) {
    yield* tokenizer.write(typeof chunk === 'string' ? chunk : decode(decoder, chunk))
  }

  yield* tokenizer.write(decode(decoder))
  yield* tokenizer.end()
}
