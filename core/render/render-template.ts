import type { RenderContext, RenderValue } from '../../types/render-context'
import type { TemplateNode } from '../../types/template-node'

import { parseTemplate } from './parse-template'
import { escapeHtml } from './escape-html'

/** Rendering options. */
export interface RenderOptions {
  /** Escaping applied to substituted values. Defaults to `html`. */
  escape?: 'html' | 'none'
}

/**
 * Render a logic-less template.
 *
 * Variables missing from the context render as the empty string. Sections
 * iterate over lists, render once for other truthy values and are skipped for
 * `false`, `null`, `undefined`, `''` and empty lists. Names are looked up from
 * the innermost section outwards.
 *
 * @param template - Template source.
 * @param context - Data to render.
 * @param options - Rendering options.
 * @returns Rendered text.
 */
export function renderTemplate(
  template: string,
  context: RenderContext,
  options: RenderOptions = {},
): string {
  let escape =
    options.escape === 'none' ? (value: string) => value : escapeHtml
  return renderNodes(parseTemplate(template), [context], escape)
}

function renderNodes(
  nodes: TemplateNode[],
  stack: RenderContext[],
  escape: (value: string) => string,
): string {
  let output = ''

  for (let node of nodes) {
    switch (node.type) {
      case 'variable':
        output += escape(stringify(lookup(stack, node.name)))
        break
      case 'section': {
        let value = lookup(stack, node.name)
        if (isFalsy(value)) {
          break
        }
        if (Array.isArray(value)) {
          for (let item of value) {
            output += renderNodes(node.children, [...stack, item], escape)
          }
        } else if (typeof value === 'object' && value !== null) {
          output += renderNodes(node.children, [...stack, value], escape)
        } else {
          output += renderNodes(node.children, stack, escape)
        }
        break
      }
      case 'text':
        output += node.value
        break
    }
  }

  return output
}

function lookup(stack: RenderContext[], name: string): RenderValue {
  for (let index = stack.length - 1; index >= 0; index--) {
    let frame = stack[index]
    if (frame && Object.hasOwn(frame, name)) {
      return frame[name]
    }
  }
  return undefined
}

function isFalsy(value: RenderValue): boolean {
  return (
    value === undefined ||
    value === null ||
    value === false ||
    value === '' ||
    (Array.isArray(value) && value.length === 0)
  )
}

function stringify(value: RenderValue): string {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  return ''
}
