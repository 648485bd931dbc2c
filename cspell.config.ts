import { defineConfig } from 'cspell'

export default defineConfig({
  words: [
    'andymatuschak',
    'appcast',
    'cfbundle',
    'dsakey',
    'edsignature',
    'htmlpreview',
    'kbd',
    'keepparent',
    'lsuielement',
    'mkdtemp',
    'nanospinner',
    'octo',
    'plist',
    'pubdate',
    'purl',
    'shiftit',
    'sufeedurl',
    'unstub',
    'xcodebuild',
    'xmlns',
  ],
  ignorePaths: [
    '.github',
    'changelog.md',
    'license',
    'package-lock.json',
    'tsconfig.json',
  ],
  dictionaries: ['css', 'html', 'node', 'npm', 'typescript'],
  useGitignore: true,
  language: 'en',
})
