/** Output flavours of the release notes. */
export type ReleaseNotesFormat = 'markdown' | 'html'
