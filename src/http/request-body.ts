/**
 * Request body readers for the HTTP surface: JSON documents and a single
 * multipart file field (parsed by busboy).
 *
 * @module http/request-body
 */

import type { IncomingMessage } from 'node:http';
import busboy from 'busboy';
import { BadRequestError, RequestValidationError } from '../errors.js';

const MAX_JSON_BYTES = 1024 * 1024;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export interface UploadedFile {
  fieldName: string;
  /** Client-side file name, when the browser sent one. */
  filename: string | undefined;
  mimeType: string;
  data: Buffer;
}

/**
 * Read and parse a JSON request body.
 *
 * @throws {BadRequestError} 400 for malformed JSON, 413 past 1 MiB
 */
export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buf.length;
    if (size > MAX_JSON_BYTES) {
      throw new BadRequestError(`Request body exceeds ${MAX_JSON_BYTES} bytes`, 413);
    }
    chunks.push(buf);
  }

  const text = Buffer.concat(chunks).toString('utf-8');
  if (text.trim() === '') {
    throw new BadRequestError('Request body is empty');
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new BadRequestError(`Invalid JSON: ${errorMessage(err)}`);
  }
}

/**
 * Read the multipart file field `fieldName` from the request.
 *
 * Other file fields are drained and ignored.
 *
 * @throws {BadRequestError} 400 for a non-multipart body, 413 past `maxBytes`
 * @throws {RequestValidationError} when the field is missing
 */
export function readUploadedFile(req: IncomingMessage, fieldName: string, maxBytes: number): Promise<UploadedFile> {
  return new Promise<UploadedFile>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({ headers: req.headers, limits: { fileSize: maxBytes, files: 4 } });
    } catch (err) {
      req.resume();
      reject(new BadRequestError(`Expected a multipart/form-data upload: ${errorMessage(err)}`));
      return;
    }

    let upload: UploadedFile | null = null;
    let tooLarge = false;

    parser.on('file', (name, stream, info) => {
      if (name !== fieldName || upload !== null) {
        stream.resume();
        return;
      }

      const chunks: Buffer[] = [];
      const file: UploadedFile = {
        fieldName: name,
        filename: info.filename || undefined,
        mimeType: info.mimeType,
        data: Buffer.alloc(0),
      };
      upload = file;

      stream.on('data', (chunk: Buffer) => chunks.push(chunk));
      stream.on('limit', () => {
        tooLarge = true;
      });
      stream.on('end', () => {
        file.data = Buffer.concat(chunks);
      });
    });

    parser.on('error', (err) => {
      reject(new BadRequestError(`Malformed multipart body: ${errorMessage(err)}`));
    });

    parser.on('close', () => {
      if (tooLarge) {
        reject(new BadRequestError(`Uploaded file exceeds ${maxBytes} bytes`, 413));
      } else if (upload === null) {
        reject(new RequestValidationError([`${fieldName}: Required`]));
      } else {
        resolve(upload);
      }
    });

    req.pipe(parser);
  });
}
