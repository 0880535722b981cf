import type { BusinessCardRecord, RootDescriptor, XmlAttribute } from '../types.js'

import { escapeAttributeValue } from './entities.js'

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n'

export function renderStartTag(name: string, attributes: XmlAttribute[]): string {
  let tag = `<${name}`
  for (const attribute of attributes) {
    tag += ` ${attribute.name}="${escapeAttributeValue(attribute.value)}"`
  }

  return `${tag}>`
}

export function renderRootOpenTag(root: RootDescriptor): string {
  return renderStartTag(root.name, root.attributes)
}

export function renderRootCloseTag(root: RootDescriptor): string {
  return `</${root.name}>`
}

/** Header written once at the top of every shard. */
export function renderShardHeader(root: RootDescriptor): string {
  return `${XML_DECLARATION}${renderRootOpenTag(root)}\n`
}

export function renderShardFooter(root: RootDescriptor): string {
  return `${renderRootCloseTag(root)}\n`
}

export function renderRecord(record: BusinessCardRecord): string {
  return `${renderStartTag(record.elementName, record.attributes)}${record.innerContent}</${record.elementName}>\n`
}
