import * as fs from 'fs';
import * as path from 'path';
import { FileHandle } from 'fs/promises';
import { glob } from 'glob';
import { IFileStorage } from '../../domain/interfaces/IFileStorage';
import { Filename } from '../../domain/value-objects/Filename';
import { IOError } from '../../shared/errors/AppError';
import { ILogger } from '../../shared/logging/Logger';

const fsPromises = fs.promises;

export class LocalFileStorage implements IFileStorage {
    constructor(private logger: ILogger) {}

    async writeAtomic(filePath: string, data: Buffer | string): Promise<void> {
        const fullPath = path.resolve(filePath);
        const writingPath = `${fullPath}${Filename.TEMP_SUFFIX}`;

        let handle: FileHandle | undefined;
        try {
            handle = await fsPromises.open(writingPath, 'w');
            await handle.writeFile(data);
            await handle.sync();
            const opened = handle;
            handle = undefined;
            await opened.close();
        } catch (error) {
            await this.closeAfterFailure(handle, writingPath);
            throw new IOError(`Failed to write ${writingPath}: ${messageOf(error)}`, writingPath, error);
        }

        try {
            await fsPromises.rename(writingPath, fullPath);
        } catch (error) {
            throw new IOError(`Failed to move ${writingPath} into place: ${messageOf(error)}`, fullPath, error);
        }

        this.logger.debug(`File saved: ${filePath} (${Buffer.byteLength(data)} bytes)`);
    }

    /**
     * The write error is the one reported; a close failure after it is only logged
     */
    private async closeAfterFailure(handle: FileHandle | undefined, writingPath: string): Promise<void> {
        try {
            await handle?.close();
        } catch (closeError) {
            this.logger.warn(`Failed to close ${writingPath}: ${messageOf(closeError)}`);
        }
    }

    async read(filePath: string): Promise<Buffer> {
        try {
            return await fsPromises.readFile(path.resolve(filePath));
        } catch (error) {
            throw new IOError(`Failed to read ${filePath}: ${messageOf(error)}`, filePath, error);
        }
    }

    async exists(filePath: string): Promise<boolean> {
        try {
            await fsPromises.access(path.resolve(filePath), fs.constants.F_OK);
            return true;
        } catch {
            return false;
        }
    }

    async delete(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(path.resolve(filePath));
            this.logger.debug(`File deleted: ${filePath}`);
        } catch (error) {
            if (errorCode(error) === 'ENOENT') {
                // File doesn't exist, consider it deleted
                return;
            }
            throw new IOError(`Failed to delete ${filePath}: ${messageOf(error)}`, filePath, error);
        }
    }

    async ensureDirectory(dirPath: string): Promise<void> {
        try {
            await fsPromises.mkdir(path.resolve(dirPath), { recursive: true });
        } catch (error) {
            throw new IOError(`Failed to create directory ${dirPath}: ${messageOf(error)}`, dirPath, error);
        }
    }

    async resetDirectory(dirPath: string): Promise<void> {
        const fullPath = path.resolve(dirPath);
        try {
            await fsPromises.rm(fullPath, { recursive: true, force: true });
        } catch (error) {
            throw new IOError(`Failed to remove directory ${dirPath}: ${messageOf(error)}`, dirPath, error);
        }
        await this.ensureDirectory(fullPath);
        this.logger.debug(`Directory reset: ${dirPath}`);
    }

    async removeTemporaryFiles(directory: string): Promise<string[]> {
        const pattern = `*${Filename.TEMP_SUFFIX}`;
        let files: string[];
        try {
            files = await glob(pattern, { cwd: path.resolve(directory), absolute: true, dot: true, nodir: true });
        } catch (error) {
            throw new IOError(`Failed to list ${directory}: ${messageOf(error)}`, directory, error);
        }

        for (const file of files) {
            await this.delete(file);
        }
        if (files.length > 0) {
            this.logger.info(`Removed ${files.length} unfinished file(s) from ${directory}`);
        }
        return files.sort();
    }
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}
