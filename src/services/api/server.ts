import http from 'http';
import { env } from '../../config/env';
import { MAX_UPLOAD_BYTES } from '../../config/constants';
import { getErrorMessage } from '../../utils/errors';
import { dispatch, toJson } from './routes';

// base64 inflates uploads by a third
const MAX_BODY_BYTES = Math.ceil((MAX_UPLOAD_BYTES * 4) / 3) + 64 * 1024;

class BodyError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
  }
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new BodyError('Request body too large', 413));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      const raw = Buffer.concat(chunks).toString('utf8');
      if (!raw.trim()) {
        resolve(undefined);
        return;
      }
      try {
        resolve(JSON.parse(raw));
      } catch {
        reject(new BodyError('Request body is not valid JSON', 400));
      }
    });
    req.on('error', reject);
  });
}

async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  try {
    const body = req.method === 'POST' || req.method === 'PUT' ? await readBody(req) : undefined;
    const response = await dispatch({ method: req.method ?? 'GET', url: req.url ?? '/', headers: req.headers, body });

    res.writeHead(response.status, response.headers);
    res.end(response.body);
  } catch (error) {
    const status = error instanceof BodyError ? error.status : 500;
    if (status === 500) {
      console.error('[API] Request failed:', getErrorMessage(error));
    }
    res.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
    res.end(toJson({ error: status === 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST', message: getErrorMessage(error) }));
  }
}

export function startApiServer(port: number = env.API_PORT): http.Server {
  const server = http.createServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      console.error('[API] Unhandled error:', getErrorMessage(error));
    });
  });

  server.listen(port, () => {
    console.log(`[API] Server running on port ${port}`);
  });

  return server;
}
