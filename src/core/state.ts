import type { ReleaseState, Versions } from '../types.ts'

export interface ReleaseStateInit {
	version: string
	useDefaults?: boolean
	skipTests?: boolean
	versions?: Versions
	metadata?: Record<string, string>
}

function freeze(state: ReleaseState): ReleaseState {
	return Object.freeze(state)
}

/**
 * Initial state for one release run
 */
export function createReleaseState(init: ReleaseStateInit): ReleaseState {
	return freeze({
		useDefaults: init.useDefaults ?? false,
		skipTests: init.skipTests ?? false,
		version: init.version,
		...(init.versions ? { versions: Object.freeze({ ...init.versions }) } : {}),
		metadata: Object.freeze({ ...init.metadata }),
	})
}

export function withVersions(state: ReleaseState, versions: Versions): ReleaseState {
	return freeze({ ...state, versions: Object.freeze({ ...versions }) })
}

/** Update the in-memory build version */
export function withVersion(state: ReleaseState, version: string): ReleaseState {
	return freeze({ ...state, version })
}

export function withMetadata(state: ReleaseState, entries: Record<string, string>): ReleaseState {
	return freeze({ ...state, metadata: Object.freeze({ ...state.metadata, ...entries }) })
}

/**
 * Versions chosen by the inquiry step, or null when it has not run
 */
export function getVersions(state: ReleaseState): Readonly<Versions> | null {
	return state.versions ?? null
}
