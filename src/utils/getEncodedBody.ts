import { gzip } from 'zlib';
import OutputLogger from '../OutputLogger';

export type CompressionType = 'gzip' | 'none';

export async function getEncodedBody(
  body: Record<string, unknown> | undefined,
  compression: CompressionType,
): Promise<{ contents: string | Buffer | undefined; contentEncoding?: string }> {
  const bodyString = body ? JSON.stringify(body) : undefined;
  if (compression === 'none' || !bodyString) {
    return { contents: bodyString };
  }

  try {
    const compressed = await new Promise<Buffer>((resolve, reject) => {
      gzip(bodyString, (err, result) => {
        if (err) return reject(err);
        resolve(result);
      });
    });
    return { contents: compressed, contentEncoding: 'gzip' };
  } catch (e) {
    OutputLogger.debug('Failed to compress request body', e);
    return { contents: bodyString };
  }
}
