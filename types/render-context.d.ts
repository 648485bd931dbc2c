/** Value a template tag can refer to. */
export type RenderValue =
  | RenderContext[]
  | RenderContext
  | undefined
  | boolean
  | number
  | string
  | null

/** Data a template is rendered against. */
export interface RenderContext {
  [name: string]: RenderValue
}
