/** Label and value printed by the `info` command. */
export interface InfoEntry {
  label: string
  value: string
}
