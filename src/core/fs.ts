import { mkdir, readdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import path from 'node:path'

export interface FileSystem {
    readText(path: string): Promise<string>
    writeText(path: string, content: string): Promise<void>
    exists(path: string): Promise<boolean>
    isDirectory(path: string): Promise<boolean>
    readDir(path: string): Promise<string[]>
    mkdir(path: string): Promise<void>
    rename(from: string, to: string): Promise<void>
    remove(path: string): Promise<void>
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

export class NodeFileSystem implements FileSystem {
    async readText(filePath: string): Promise<string> {
        return readFile(filePath, 'utf8')
    }

    async writeText(filePath: string, content: string): Promise<void> {
        await writeFile(filePath, content, 'utf8')
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await stat(filePath)
            return true
        } catch (error) {
            if (isNotFound(error)) return false
            throw error
        }
    }

    async isDirectory(filePath: string): Promise<boolean> {
        try {
            return (await stat(filePath)).isDirectory()
        } catch (error) {
            if (isNotFound(error)) return false
            throw error
        }
    }

    async readDir(dirPath: string): Promise<string[]> {
        return readdir(dirPath)
    }

    async mkdir(dirPath: string): Promise<void> {
        await mkdir(dirPath, { recursive: true })
    }

    async rename(from: string, to: string): Promise<void> {
        await rename(from, to)
    }

    async remove(filePath: string): Promise<void> {
        await rm(filePath, { recursive: true, force: true })
    }
}

/**
 * In-memory file system for tests. Directories are tracked explicitly so
 * `mkdir` side effects are observable.
 */
export class MockFileSystem implements FileSystem {
    private files = new Map<string, string>()
    private dirs = new Set<string>()

    async readText(filePath: string): Promise<string> {
        const content = this.files.get(filePath)
        if (content === undefined) throw new Error(`ENOENT: ${filePath}`)
        return content
    }

    async writeText(filePath: string, content: string): Promise<void> {
        if (!this.dirs.has(path.dirname(filePath)) && path.dirname(filePath) !== '/') {
            throw new Error(`ENOENT: no such directory ${path.dirname(filePath)}`)
        }
        this.files.set(filePath, content)
    }

    async exists(filePath: string): Promise<boolean> {
        return this.files.has(filePath) || this.dirs.has(filePath)
    }

    async isDirectory(filePath: string): Promise<boolean> {
        return this.dirs.has(filePath)
    }

    async readDir(dirPath: string): Promise<string[]> {
        if (!this.dirs.has(dirPath)) throw new Error(`ENOENT: ${dirPath}`)
        const entries = new Set<string>()
        for (const key of [...this.files.keys(), ...this.dirs]) {
            if (path.dirname(key) === dirPath && key !== dirPath) entries.add(path.basename(key))
        }
        return [...entries].sort()
    }

    async mkdir(dirPath: string): Promise<void> {
        let current = dirPath
        while (current !== path.dirname(current)) {
            this.dirs.add(current)
            current = path.dirname(current)
        }
    }

    async rename(from: string, to: string): Promise<void> {
        const content = await this.readText(from)
        this.files.delete(from)
        this.files.set(to, content)
    }

    async remove(filePath: string): Promise<void> {
        this.files.delete(filePath)
        this.dirs.delete(filePath)
    }

    setFile(filePath: string, content: string): void {
        this.files.set(filePath, content)
        let current = path.dirname(filePath)
        while (current !== path.dirname(current)) {
            this.dirs.add(current)
            current = path.dirname(current)
        }
    }

    getFiles(): Map<string, string> {
        return new Map(this.files)
    }

    getDirs(): string[] {
        return [...this.dirs].sort()
    }
}
