/**
 * Uploaded file metadata, as handed over by the HTTP layer for each
 * multipart field. Validated on every decode: a malformed entry fails
 * the request with `FILE_FIELD`.
 *
 * @module
 */
import { z } from 'zod';

export const FileInfoSchema = z.object({
    /** Where the HTTP layer stored the upload */
    tmpFilename: z.string().min(1),
    /** Size in bytes */
    filesize: z.number().int().nonnegative(),
    /** File name exactly as sent by the client (may contain a path) */
    rawOriginalBasename: z.string(),
    /** Base name of the client's file, path stripped */
    originalBasename: z.string(),
    /** Content type declared by the client, when any */
    contentType: z.string().optional(),
});

export type FileInfo = z.infer<typeof FileInfoSchema>;
