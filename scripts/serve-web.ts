import 'dotenv/config';
import http from 'node:http';
import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { loadConfig } from '../src/lib/config.js';

const config = loadConfig();
const webRoot = config.webDir;

const mimeTypes: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

function getContentType(filePath: string) {
  const ext = path.extname(filePath).toLowerCase();
  return mimeTypes[ext] ?? 'application/octet-stream';
}

function isPathInside(base: string, target: string) {
  const relative = path.relative(base, target);
  return !relative.startsWith('..') && !path.isAbsolute(relative);
}

async function resolvePath(requestPath: string) {
  const decoded = decodeURIComponent(requestPath);
  const candidate = path.normalize(path.join(webRoot, decoded));
  if (!isPathInside(webRoot, candidate)) {
    return null;
  }
  try {
    const stats = await fs.stat(candidate);
    if (!stats.isDirectory()) return candidate;
    const indexPath = path.join(candidate, 'index.html');
    await fs.access(indexPath);
    return indexPath;
  } catch {
    return null;
  }
}

const server = http.createServer((req, res) => {
  const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
  resolvePath(url.pathname)
    .then(filePath => {
      if (!filePath) {
        res.writeHead(404, { 'Content-Type': 'text/plain; charset=utf-8' });
        res.end('Not found');
        return;
      }
      res.writeHead(200, { 'Content-Type': getContentType(filePath) });
      createReadStream(filePath).pipe(res);
    })
    .catch(err => {
      console.error(`Error serving ${url.pathname}:`, err);
      res.writeHead(500, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('Internal error');
    });
});

server.listen(config.port, () => {
  console.log(`Serving league pages from ${webRoot} on http://localhost:${config.port}`);
  console.log('Run generate-pages first if the directory is empty.');
});
