import { existsSync, readFileSync, renameSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import { ValidationError } from './errors.ts'

export interface PackageJson {
	name?: string
	version?: string
	private?: boolean
	dependencies?: Record<string, string>
	devDependencies?: Record<string, string>
	optionalDependencies?: Record<string, string>
	peerDependencies?: Record<string, string>
}

export function readPackageJson(dir: string): PackageJson | null {
	const pkgPath = join(dir, 'package.json')
	if (!existsSync(pkgPath)) return null
	try {
		return JSON.parse(readFileSync(pkgPath, 'utf-8'))
	} catch (error) {
		throw new ValidationError(
			`Could not parse ${pkgPath}: ${error instanceof Error ? error.message : String(error)}`
		)
	}
}

export function fileExists(path: string): boolean {
	return existsSync(path)
}

export function readFile(path: string): string | null {
	if (!existsSync(path)) return null
	return readFileSync(path, 'utf-8')
}

export function writeFile(path: string, content: string): void {
	writeFileSync(path, content, 'utf-8')
}

/**
 * Write through a sibling temp file and rename over the target
 */
export function writeFileAtomic(path: string, content: string): void {
	const tmpPath = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`)
	writeFileSync(tmpPath, content, 'utf-8')
	renameSync(tmpPath, path)
}
