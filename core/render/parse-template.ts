import type { TemplateNode } from '../../types/template-node'

import { TemplateSyntaxError } from '../errors/template-syntax-error'

/** Section tag alone on its line, including the line break. */
const STANDALONE_SECTION_TAG = /^[\t ]*\{\{([#/])\s*([^\s{}]*)\s*\}\}[\t ]*(?:\r?\n)?$/u

/** Names tags may refer to. */
const TAG_NAME = /^[\w.-]+$/u

/** Open section on the parse stack. */
interface OpenSection {
  children: TemplateNode[]
  name: string
  line: number
}

/**
 * Parse a template into a tree of text, variable and section nodes.
 *
 * Supported tags are `{{name}}`, `{{#name}}` and `{{/name}}`. A section tag
 * that is the only content of its line removes the whole line from the
 * output. Tags cannot span lines.
 *
 * @param template - Template source.
 * @returns Root nodes.
 */
export function parseTemplate(template: string): TemplateNode[] {
  let root: TemplateNode[] = []
  let stack: OpenSection[] = []

  function current(): TemplateNode[] {
    return stack.at(-1)?.children ?? root
  }

  function openSection(name: string, line: number): void {
    stack.push({ children: [], name, line })
  }

  function closeSection(name: string, line: number): void {
    let section = stack.pop()
    if (!section) {
      throw new TemplateSyntaxError(`unexpected closing tag "${name}"`, line)
    }
    if (section.name !== name) {
      throw new TemplateSyntaxError(
        `closing tag "${name}" does not match "${section.name}" opened on line ${section.line}`,
        line,
      )
    }
    current().push({
      children: section.children,
      name: section.name,
      type: 'section',
    })
  }

  function handleTag(sigil: string, name: string, line: number): void {
    if (!TAG_NAME.test(name)) {
      throw new TemplateSyntaxError(`invalid tag name "${name}"`, line)
    }
    if (sigil === '#') {
      openSection(name, line)
    } else if (sigil === '/') {
      closeSection(name, line)
    } else {
      current().push({ type: 'variable', name })
    }
  }

  let lines = template.split(/(?<=\n)/u)

  for (let [index, text] of lines.entries()) {
    let line = index + 1

    let standalone = text.match(STANDALONE_SECTION_TAG)
    if (standalone) {
      handleTag(standalone[1] ?? '', standalone[2] ?? '', line)
      continue
    }

    let position = 0
    while (position < text.length) {
      let start = text.indexOf('{{', position)
      if (start === -1) {
        current().push({ value: text.slice(position), type: 'text' })
        break
      }
      if (start > position) {
        current().push({ value: text.slice(position, start), type: 'text' })
      }

      let end = text.indexOf('}}', start + 2)
      if (end === -1) {
        throw new TemplateSyntaxError('unclosed tag', line)
      }

      let content = text.slice(start + 2, end).trim()
      let sigil = content.charAt(0)
      if (sigil === '#' || sigil === '/') {
        handleTag(sigil, content.slice(1).trim(), line)
      } else if (/^[!&=>^{]/u.test(sigil)) {
        throw new TemplateSyntaxError(`unsupported tag "{{${content}}}"`, line)
      } else {
        handleTag('', content, line)
      }

      position = end + 2
    }
  }

  let unclosed = stack.at(-1)
  if (unclosed) {
    throw new TemplateSyntaxError(
      `section "${unclosed.name}" is never closed`,
      unclosed.line,
    )
  }

  return root
}
