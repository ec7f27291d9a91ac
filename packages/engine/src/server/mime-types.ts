import { ComponentLogger } from '../logging/logger.js'

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.css': 'text/css',
  '.js': 'application/javascript',
}

export const DEFAULT_MIME_TYPE = 'application/octet-stream'

/**
 * Content type for a file name, by its final extension. The lookup is
 * case-sensitive: `photo.PNG` is not `image/png`.
 */
export function getMimeType(name: string, log?: ComponentLogger): string {
  const dot = name.lastIndexOf('.')
  if (dot === -1) {
    log?.warn('getMimeType', 'No extension in', name)
    return DEFAULT_MIME_TYPE
  }

  const ext = name.substring(dot)
  const mimeType = MIME_TYPES[ext]
  if (mimeType === undefined) {
    log?.warn('getMimeType', 'No content type for', ext)
    return DEFAULT_MIME_TYPE
  }

  log?.info('getMimeType', 'Content-Type found for', ext)
  return mimeType
}
