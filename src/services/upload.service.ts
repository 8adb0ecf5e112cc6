import path from 'path'
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'

/**
 * Scratch directory owned by one request. Files written through `hold` exist
 * only while the callback runs; `close` removes the directory itself.
 */
export class UploadScope {
    readonly dir: string

    private constructor(dir: string) {
        this.dir = dir
    }

    static async open(root: string): Promise<UploadScope> {
        await mkdir(root, { recursive: true })
        return new UploadScope(await mkdtemp(path.join(root, 'req-')))
    }

    async hold<T>(filename: string, data: Buffer, use: (filePath: string) => Promise<T>): Promise<T> {
        const filePath = path.join(this.dir, filename)
        try {
            await writeFile(filePath, data)
            return await use(filePath)
        } finally {
            await rm(filePath, { force: true })
        }
    }

    async close(): Promise<void> {
        await rm(this.dir, { recursive: true, force: true })
    }
}

export async function withUploadScope<T>(root: string, use: (scope: UploadScope) => Promise<T>): Promise<T> {
    const scope = await UploadScope.open(root)
    try {
        return await use(scope)
    } finally {
        await scope.close()
    }
}
