export { createCredentialResolver } from './credentials/create-credential-resolver'
export { withCredentialResolver } from './credentials/with-credential-resolver'
export { createReleaseContext } from './context/create-release-context'
export { createTrackerClient } from './tracker/create-tracker-client'
export { renderReleaseNotes } from './render/render-release-notes'
export { readBundleVersion } from './metadata/read-bundle-version'
export { createCommandRunner } from './exec/create-command-runner'
export { loadReleaseConfig } from './config/load-release-config'
export { resolveMilestone } from './release/resolve-milestone'
export { getClosedIssues } from './release/get-closed-issues'
export { readPlistValue } from './metadata/read-plist-value'
export { renderTemplate } from './render/render-template'
export { renderAppcast } from './render/render-appcast'
export { signArtifact } from './signing/sign-artifact'
export { getStagePlan } from './pipeline/get-stage-plan'
export { runPipeline } from './pipeline/run-pipeline'
export { ReleaseError } from './errors/release-error'
