import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import os from 'os'
import path from 'path'
import { existsSync } from 'fs'
import { mkdtemp, readFile, readdir, rm } from 'fs/promises'
import { UploadScope, withUploadScope } from '../src/services/upload.service'

describe('UploadScope', () => {
    let root: string

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'upload-test-'))
    })

    afterEach(async () => {
        await rm(root, { recursive: true, force: true })
    })

    it('creates a private directory under the root', async () => {
        const a = await UploadScope.open(root)
        const b = await UploadScope.open(root)

        expect(path.dirname(a.dir)).toBe(root)
        expect(a.dir).not.toBe(b.dir)

        await a.close()
        await b.close()
        expect(await readdir(root)).toEqual([])
    })

    it('creates a missing root', async () => {
        const nested = path.join(root, 'uploads', 'scratch')
        const scope = await UploadScope.open(nested)

        expect(existsSync(scope.dir)).toBe(true)
        await scope.close()
    })

    it('keeps a file only while it is in use', async () => {
        const scope = await UploadScope.open(root)
        let seen = ''

        const length = await scope.hold('b.pdf', Buffer.from('Hello'), async (filePath) => {
            expect(filePath).toBe(path.join(scope.dir, 'b.pdf'))
            seen = await readFile(filePath, 'utf8')
            return seen.length
        })

        expect(seen).toBe('Hello')
        expect(length).toBe(5)
        expect(await readdir(scope.dir)).toEqual([])
        await scope.close()
        expect(existsSync(scope.dir)).toBe(false)
    })

    it('deletes the file when the callback throws', async () => {
        const scope = await UploadScope.open(root)

        await expect(
            scope.hold('a.png', Buffer.from([1, 2, 3]), async () => {
                throw new Error('extraction crashed')
            })
        ).rejects.toThrow('extraction crashed')

        expect(await readdir(scope.dir)).toEqual([])
        await scope.close()
    })
})

describe('withUploadScope', () => {
    let root: string

    beforeEach(async () => {
        root = await mkdtemp(path.join(os.tmpdir(), 'upload-test-'))
    })

    afterEach(async () => {
        await rm(root, { recursive: true, force: true })
    })

    it('returns the callback result and removes the directory', async () => {
        const result = await withUploadScope(root, async (scope) => {
            expect(existsSync(scope.dir)).toBe(true)
            return 'done'
        })

        expect(result).toBe('done')
        expect(await readdir(root)).toEqual([])
    })

    it('removes the directory when the callback throws', async () => {
        await expect(
            withUploadScope(root, async (scope) => {
                await scope.hold('a.png', Buffer.from('x'), async () => 'ok')
                throw new Error('request aborted')
            })
        ).rejects.toThrow('request aborted')

        expect(await readdir(root)).toEqual([])
    })
})
