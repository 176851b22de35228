import { promises as fsp } from 'fs';
import path from 'path';
import { ValidationError } from '../errors/assessment.errors';
import { TempMedia } from '../workers/interview-pipeline';

export const DEFAULT_MAX_FILE_SIZE_BYTES = 100 * 1024 * 1024;

const MIME_TYPES: Readonly<Record<string, string>> = {
    '.mp4': 'video/mp4',
    '.mov': 'video/quicktime',
    '.avi': 'video/x-msvideo',
    '.webm': 'video/webm',
    '.mp3': 'audio/mpeg',
    '.wav': 'audio/wav',
    '.m4a': 'audio/mp4'
};

export const ALLOWED_MEDIA_EXTENSIONS: readonly string[] = Object.keys(MIME_TYPES);

export function mediaExtension(filename: string): string {
    return path.extname(filename).toLowerCase();
}

export function isAllowedExtension(filename: string): boolean {
    return ALLOWED_MEDIA_EXTENSIONS.includes(mediaExtension(filename));
}

export function mimeTypeFor(filename: string): string {
    return MIME_TYPES[mediaExtension(filename)] ?? 'application/octet-stream';
}

/**
 * Replace anything outside word characters, dash and dot, and cap the length.
 */
export function sanitizeFilename(filename: string): string {
    return filename.replace(/[^\w\-.]/g, '_').slice(0, 100);
}

export function validateMedia(
    file: { originalName: string; size: number },
    maxBytes: number = DEFAULT_MAX_FILE_SIZE_BYTES
): void {
    if (!isAllowedExtension(file.originalName)) {
        throw new ValidationError(
            `Unsupported file format. Supported formats: ${ALLOWED_MEDIA_EXTENSIONS.join(', ')}`
        );
    }
    if (file.size > maxBytes) {
        throw new ValidationError(`File size exceeds ${Math.round(maxBytes / (1024 * 1024))}MB limit`);
    }
    if (file.size === 0) {
        throw new ValidationError('Uploaded file is empty');
    }
}

/**
 * Wrap a stored upload as pipeline media. Releasing deletes the file; a
 * second release is a no-op.
 */
export function toTempMedia(file: { path: string; originalName: string }): TempMedia {
    let released = false;
    return {
        path: file.path,
        originalName: file.originalName,
        mimeType: mimeTypeFor(file.originalName),
        async release() {
            if (released) return;
            released = true;
            await fsp.rm(file.path, { force: true });
        }
    };
}
