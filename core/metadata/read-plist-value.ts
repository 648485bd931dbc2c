import { XMLParser } from 'fast-xml-parser'
import { readFile } from 'node:fs/promises'

import { MetadataKeyNotFoundError } from '../errors/metadata-key-not-found-error'
import { InvalidConfigError } from '../errors/invalid-config-error'

/**
 * Element of the order-preserving parser output: a single tag name mapped to
 * its children, or a text node.
 */
type XmlNode = Record<string, unknown>

/**
 * Read the text of a keyed entry from the top-level dictionary of an XML
 * property list.
 *
 * Entries are `<key>` elements immediately followed by their value element.
 *
 * @param plistPath - Property list file.
 * @param key - Dictionary key, e.g. `SUFeedURL`.
 * @returns Trimmed text of the value element.
 */
export async function readPlistValue(
  plistPath: string,
  key: string,
): Promise<string> {
  let content = await readFile(plistPath, 'utf8')
  let parser = new XMLParser({
    ignoreAttributes: true,
    parseTagValue: false,
    preserveOrder: true,
    trimValues: true,
  })

  let document: unknown = parser.parse(content)
  let plist = findChild(toNodes(document), 'plist')
  let dict = plist ? findChild(plist, 'dict') : undefined
  if (!dict) {
    throw new InvalidConfigError(plistPath, 'no top-level <dict> element')
  }

  for (let index = 0; index < dict.length; index++) {
    let entry = dict[index]
    if (!entry || !('key' in entry) || textOf(entry['key']) !== key) {
      continue
    }

    let value = dict[index + 1]
    let tag = value ? Object.keys(value)[0] : undefined
    if (!value || !tag || tag === 'key') {
      break
    }
    return textOf(value[tag]).trim()
  }

  throw new MetadataKeyNotFoundError(key, plistPath)
}

function toNodes(value: unknown): XmlNode[] {
  if (!Array.isArray(value)) {
    return []
  }
  return value.filter(
    (item): item is XmlNode =>
      item !== null && typeof item === 'object' && !Array.isArray(item),
  )
}

function findChild(nodes: XmlNode[], tag: string): XmlNode[] | undefined {
  let node = nodes.find(item => tag in item)
  return node ? toNodes(node[tag]) : undefined
}

function textOf(children: unknown): string {
  return toNodes(children)
    .map(child => child['#text'])
    .filter(text => typeof text === 'string' || typeof text === 'number')
    .join('')
}
