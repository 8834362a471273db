import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdirSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { ValidationError } from '../src/utils/errors.ts'
import { fileExists, readFile, readPackageJson, writeFile, writeFileAtomic } from '../src/utils/fs.ts'

const TEST_DIR = join(tmpdir(), 'release-steps-fs-test')

describe('fs utils', () => {
	beforeEach(() => {
		rmSync(TEST_DIR, { recursive: true, force: true })
		mkdirSync(TEST_DIR, { recursive: true })
	})

	afterEach(() => {
		rmSync(TEST_DIR, { recursive: true, force: true })
	})

	describe('readPackageJson', () => {
		it('should read valid package.json', () => {
			writeFileSync(
				join(TEST_DIR, 'package.json'),
				JSON.stringify({ name: 'test-pkg', version: '1.0.0' })
			)

			const pkg = readPackageJson(TEST_DIR)

			expect(pkg?.name).toBe('test-pkg')
			expect(pkg?.version).toBe('1.0.0')
		})

		it('should return null for non-existent package.json', () => {
			expect(readPackageJson(TEST_DIR)).toBe(null)
		})

		it('should throw on invalid JSON', () => {
			writeFileSync(join(TEST_DIR, 'package.json'), '{ invalid json }')

			expect(() => readPackageJson(TEST_DIR)).toThrow(ValidationError)
		})

		it('should read dependency groups', () => {
			writeFileSync(
				join(TEST_DIR, 'package.json'),
				JSON.stringify({
					name: 'test-app',
					version: '2.0.0',
					dependencies: { dep1: '^1.0.0' },
					optionalDependencies: { opt1: '~1.2.0' },
					peerDependencies: { peer1: '^3.0.0' },
				})
			)

			const pkg = readPackageJson(TEST_DIR)

			expect(pkg?.dependencies?.dep1).toBe('^1.0.0')
			expect(pkg?.optionalDependencies?.opt1).toBe('~1.2.0')
			expect(pkg?.peerDependencies?.peer1).toBe('^3.0.0')
		})
	})

	describe('fileExists', () => {
		it('should return true for existing file', () => {
			writeFileSync(join(TEST_DIR, 'test.txt'), 'hello')

			expect(fileExists(join(TEST_DIR, 'test.txt'))).toBe(true)
		})

		it('should return false for non-existent file', () => {
			expect(fileExists(join(TEST_DIR, 'nonexistent.txt'))).toBe(false)
		})
	})

	describe('readFile / writeFile', () => {
		it('should round-trip content', () => {
			writeFile(join(TEST_DIR, 'test.txt'), 'hello world')

			expect(readFile(join(TEST_DIR, 'test.txt'))).toBe('hello world')
		})

		it('should return null for non-existent file', () => {
			expect(readFile(join(TEST_DIR, 'nonexistent.txt'))).toBe(null)
		})
	})

	describe('writeFileAtomic', () => {
		it('should replace the file and leave no temp file behind', () => {
			const path = join(TEST_DIR, 'version.conf')
			writeFileSync(path, 'old content')

			writeFileAtomic(path, 'new content')

			expect(readFileSync(path, 'utf-8')).toBe('new content')
			expect(readdirSync(TEST_DIR)).toEqual(['version.conf'])
		})
	})
})
