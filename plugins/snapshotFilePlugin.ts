// SPDX-License-Identifier: Apache-2.0
import { readFile } from 'node:fs/promises'
import path from 'node:path'
import type { Connect, Plugin } from 'vite'

export type SnapshotFileResponse = {
  status: number
  body: string
}

export type SnapshotFilePluginOptions = {
  // File written by the collection workflows, relative to the project root
  filePath?: string
  // URL the dashboard reads the snapshot from
  route?: string
}

export const DEFAULT_SNAPSHOT_FILE = 'data/live_data.json'
export const DEFAULT_SNAPSHOT_ROUTE = '/data/live_data.json'

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')
}

/**
 * Reads the snapshot fresh on every request so an external writer can replace it
 * while the server runs. Contents are passed through untouched; the browser decides
 * whether they parse.
 */
export async function readSnapshotFile(filePath: string): Promise<SnapshotFileResponse> {
  try {
    const body = await readFile(filePath, 'utf8')
    return { status: 200, body }
  } catch (err) {
    if (isMissingFile(err)) {
      return { status: 404, body: JSON.stringify({ error: 'No snapshot published yet' }) }
    }
    const message = err instanceof Error ? err.message : String(err)
    return { status: 500, body: JSON.stringify({ error: message }) }
  }
}

export function createSnapshotMiddleware(filePath: string): Connect.NextHandleFunction {
  return (req, res, next) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      next()
      return
    }
    readSnapshotFile(filePath)
      .then(({ status, body }) => {
        res.statusCode = status
        res.setHeader('Content-Type', 'application/json; charset=utf-8')
        res.setHeader('Cache-Control', 'no-store')
        res.end(req.method === 'HEAD' ? undefined : body)
      })
      .catch(next)
  }
}

export default function snapshotFilePlugin(options: SnapshotFilePluginOptions = {}): Plugin {
  const route = options.route ?? DEFAULT_SNAPSHOT_ROUTE
  let resolvedPath = options.filePath ?? DEFAULT_SNAPSHOT_FILE
  return {
    name: 'dashboard-snapshot-file',
    configResolved(config) {
      resolvedPath = path.resolve(config.root, options.filePath ?? DEFAULT_SNAPSHOT_FILE)
    },
    configureServer(server) {
      server.middlewares.use(route, createSnapshotMiddleware(resolvedPath))
    },
    configurePreviewServer(server) {
      server.middlewares.use(route, createSnapshotMiddleware(resolvedPath))
    },
  }
}
