import { expect } from 'chai'

import type { RootDescriptor } from '../../src/types.js'

import { MalformedInputError } from '../../src/errors.js'
import { decodeAttributeValue, escapeAttributeValue } from '../../src/xml/entities.js'
import { renderRecord, renderRootCloseTag, renderRootOpenTag, renderShardFooter, renderShardHeader } from '../../src/xml/render.js'

const ROOT: RootDescriptor = {
  attributes: [
    { name: 'version', value: '2' },
    { name: 'generation-date', value: '2024-01-01' },
  ],
  name: 'root',
}

describe('escapeAttributeValue', () => {
  it('escapes the five predefined entities', () => {
    expect(escapeAttributeValue(`a&b<c>"d'`)).to.equal('a&amp;b&lt;c&gt;&quot;d&apos;')
  })

  it('writes tabs and line breaks as character references', () => {
    expect(escapeAttributeValue('a\tb\nc\rd')).to.equal('a&#9;b&#10;c&#13;d')
  })

  it('keeps decoded line breaks through a second parse', () => {
    const value = decodeAttributeValue('line one&#10;line two&#9;tabbed')
    expect(decodeAttributeValue(escapeAttributeValue(value))).to.equal('line one\nline two\ttabbed')
  })

  it('escapes an ampersand only once', () => {
    expect(escapeAttributeValue('&amp;')).to.equal('&amp;amp;')
  })
})

describe('decodeAttributeValue', () => {
  it('turns literal tabs and line breaks into spaces', () => {
    expect(decodeAttributeValue('a\tb\r\nc\nd')).to.equal('a b c d')
  })

  it('keeps character references to whitespace', () => {
    expect(decodeAttributeValue('a&#10;b')).to.equal('a\nb')
  })

  it('rejects references to characters XML does not allow', () => {
    expect(() => decodeAttributeValue('&#0;')).to.throw(MalformedInputError, /Invalid character reference/)
  })
})

describe('root tag rendering', () => {
  it('renders the open tag with attributes in source order', () => {
    expect(renderRootOpenTag(ROOT)).to.equal('<root version="2" generation-date="2024-01-01">')
  })

  it('renders the close tag', () => {
    expect(renderRootCloseTag(ROOT)).to.equal('</root>')
  })

  it('frames a shard with declaration, open tag and close tag', () => {
    expect(renderShardHeader(ROOT)).to.equal(
      '<?xml version="1.0" encoding="UTF-8"?>\n<root version="2" generation-date="2024-01-01">\n',
    )
    expect(renderShardFooter(ROOT)).to.equal('</root>\n')
  })

  it('re-escapes attribute values taken from the source', () => {
    const root: RootDescriptor = { attributes: [{ name: 'title', value: 'R&D "export"' }], name: 'ns:root' }
    expect(renderRootOpenTag(root)).to.equal('<ns:root title="R&amp;D &quot;export&quot;">')
  })
})

describe('renderRecord', () => {
  it('writes the record on one line with its inner content untouched', () => {
    const line = renderRecord({
      attributes: [{ name: 'note', value: `it's <new>` }],
      countryCode: 'NO',
      elementName: 'businesscard',
      innerContent: '\n  <entity countrycode="no"/>\n',
    })
    expect(line).to.equal('<businesscard note="it&apos;s &lt;new&gt;">\n  <entity countrycode="no"/>\n</businesscard>\n')
  })
})
