import * as fs from 'fs';
import { IFileStorage, WriteOptions } from '../../domain/interfaces/IFileStorage';
import { FilesystemError } from '../../shared/errors/AppError';
import { Logger } from '../../shared/logging/Logger';

const fsPromises = fs.promises;

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error) {
        const code: unknown = Reflect.get(error, 'code');
        return typeof code === 'string' ? code : undefined;
    }
    return undefined;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class LocalFileStorage implements IFileStorage {
    constructor(private logger: Logger) {}

    async assertWritableDirectory(directory: string): Promise<void> {
        let stats: fs.Stats;
        try {
            stats = await fsPromises.stat(directory);
        } catch (error: unknown) {
            if (errorCode(error) === 'ENOENT') {
                throw new FilesystemError(`Destination directory does not exist: ${directory}`, { code: 'ENOENT' });
            }
            throw new FilesystemError(
                `Cannot access destination directory: ${errorMessage(error)}`,
                { code: errorCode(error) }
            );
        }

        if (!stats.isDirectory()) {
            throw new FilesystemError(`Destination is not a directory: ${directory}`, { code: 'ENOTDIR' });
        }

        try {
            await fsPromises.access(directory, fs.constants.W_OK);
        } catch (error: unknown) {
            throw new FilesystemError(
                `Destination directory is not writable: ${directory}`,
                { code: errorCode(error) }
            );
        }
    }

    async ensureDirectory(directory: string): Promise<void> {
        try {
            await fsPromises.mkdir(directory, { recursive: true });
        } catch (error: unknown) {
            throw new FilesystemError(
                `Failed to create directory ${directory}: ${errorMessage(error)}`,
                { code: errorCode(error) }
            );
        }
    }

    async sizeOf(filePath: string): Promise<number> {
        try {
            const stats = await fsPromises.stat(filePath);
            return stats.isFile() ? stats.size : 0;
        } catch (error: unknown) {
            if (errorCode(error) === 'ENOENT') {
                return 0;
            }
            throw new FilesystemError(`Failed to stat file: ${errorMessage(error)}`, { code: errorCode(error) });
        }
    }

    async writeStream(
        filePath: string,
        body: NodeJS.ReadableStream,
        options: WriteOptions = {}
    ): Promise<number> {
        const { append = false, onChunk } = options;
        let handle: fs.promises.FileHandle;

        try {
            handle = await fsPromises.open(filePath, append ? 'a' : 'w');
        } catch (error: unknown) {
            throw new FilesystemError(`Failed to open ${filePath}: ${errorMessage(error)}`, { code: errorCode(error) });
        }

        let written = 0;
        try {
            for await (const chunk of body) {
                const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
                await this.writeChunk(handle, buffer, filePath);
                written += buffer.length;
                onChunk?.(buffer.length);
            }
        } catch (error: unknown) {
            // The transfer error is the one the caller needs
            await this.closeAfterFailure(handle, filePath);
            throw error;
        }

        try {
            await handle.close();
        } catch (error: unknown) {
            throw new FilesystemError(`Failed to close ${filePath}: ${errorMessage(error)}`, { code: errorCode(error) });
        }

        this.logger.debug(`Wrote ${written} bytes to ${filePath}`, { append });
        return written;
    }

    async readRange(filePath: string, offset: number, length: number): Promise<Buffer> {
        let handle: fs.promises.FileHandle;
        try {
            handle = await fsPromises.open(filePath, 'r');
        } catch (error: unknown) {
            throw new FilesystemError(`Failed to read ${filePath}: ${errorMessage(error)}`, { code: errorCode(error) });
        }

        let bytes: Buffer;
        try {
            const buffer = Buffer.alloc(Math.max(0, length));
            const { bytesRead } = await handle.read(buffer, 0, buffer.length, Math.max(0, offset));
            bytes = buffer.subarray(0, bytesRead);
        } catch (error: unknown) {
            await this.closeAfterFailure(handle, filePath);
            throw new FilesystemError(`Failed to read ${filePath}: ${errorMessage(error)}`, { code: errorCode(error) });
        }

        await this.closeAfterFailure(handle, filePath);
        return bytes;
    }

    async rename(from: string, to: string): Promise<void> {
        try {
            await fsPromises.rename(from, to);
            this.logger.debug(`Renamed ${from} -> ${to}`);
        } catch (error: unknown) {
            throw new FilesystemError(`Failed to move ${from} to ${to}: ${errorMessage(error)}`, { code: errorCode(error) });
        }
    }

    async delete(filePath: string): Promise<void> {
        try {
            await fsPromises.unlink(filePath);
            this.logger.debug(`File deleted: ${filePath}`);
        } catch (error: unknown) {
            if (errorCode(error) === 'ENOENT') {
                return;
            }
            throw new FilesystemError(`Failed to delete file: ${errorMessage(error)}`, { code: errorCode(error) });
        }
    }

    /**
     * Close without throwing, so an error already in flight is not replaced
     */
    private async closeAfterFailure(handle: fs.promises.FileHandle, filePath: string): Promise<void> {
        try {
            await handle.close();
        } catch (error: unknown) {
            this.logger.warn(`Failed to close ${filePath}`, { error: errorMessage(error) });
        }
    }

    private async writeChunk(handle: fs.promises.FileHandle, buffer: Buffer, filePath: string): Promise<void> {
        try {
            await handle.write(buffer);
        } catch (error: unknown) {
            throw new FilesystemError(`Failed to write ${filePath}: ${errorMessage(error)}`, { code: errorCode(error) });
        }
    }
}
