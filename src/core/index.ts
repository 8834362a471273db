export { loadConfig, getDefaultConfig, defineConfig, resolveConfig, resolveLineSeparator } from './config.ts'
export {
	parseVersion,
	formatVersion,
	isValidVersion,
	proposeRelease,
	proposeNext,
	suggestReleaseVersion,
	suggestNextVersion,
	compareVersions,
	formatTagName,
	DEFAULT_SNAPSHOT_QUALIFIER,
	type Version,
	type VersionParseResult,
} from './version.ts'
export {
	createReleaseState,
	withVersions,
	withVersion,
	withMetadata,
	getVersions,
	type ReleaseStateInit,
} from './state.ts'
export { runPipeline, selectSteps, proceed, abort, type RunPipelineOptions } from './pipeline.ts'
export { resolveTag, tagConflictPrompt, type ResolveTagOptions } from './tag.ts'
export {
	checkGit,
	checkSnapshotDependencies,
	inquireVersions,
	runTests,
	setReleaseVersion,
	setNextVersion,
	commitReleaseVersion,
	commitNextVersion,
	tagRelease,
	pushChanges,
	defaultReleaseSteps,
	getStep,
} from './steps.ts'
export {
	formatVersionDeclaration,
	parseVersionDeclaration,
	readVersionFile,
	writeVersionFile,
} from './version-file.ts'
export { createNodeHost, isUnstableSpecifier, type NodeHostOptions } from './host.ts'
