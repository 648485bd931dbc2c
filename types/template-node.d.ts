/** Parsed template tree. */
export type TemplateNode =
  | {
      children: TemplateNode[]
      type: 'section'
      name: string
    }
  | { type: 'variable'; name: string }
  | { type: 'text'; value: string }
