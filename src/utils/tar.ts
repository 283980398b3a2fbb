import * as fs from 'fs';
import * as path from 'path';
import * as tar from 'tar-stream';

function addEntries(pack: tar.Pack, root: string, relative: string): void {
  const entries = fs.readdirSync(path.join(root, relative), { withFileTypes: true });

  for (const entry of entries) {
    const name = relative ? `${relative}/${entry.name}` : entry.name;
    const fullPath = path.join(root, name);
    const stats = fs.lstatSync(fullPath);

    if (entry.isDirectory()) {
      pack.entry({ name, type: 'directory', mode: stats.mode & 0o7777, mtime: stats.mtime });
      addEntries(pack, root, name);
    } else if (entry.isSymbolicLink()) {
      pack.entry({
        name,
        type: 'symlink',
        linkname: fs.readlinkSync(fullPath),
        mtime: stats.mtime,
      });
    } else if (entry.isFile()) {
      pack.entry(
        { name, mode: stats.mode & 0o7777, mtime: stats.mtime },
        fs.readFileSync(fullPath),
      );
    }
    // Sockets, fifos and devices have no place in a source tree
  }
}

/**
 * Pack a host directory into a tar stream. Entry names are relative to
 * the directory, so extracting with `tar -x -C <dest>` recreates its
 * contents under dest.
 */
export function packDirectory(dir: string): tar.Pack {
  const stat = fs.statSync(dir);
  if (!stat.isDirectory()) {
    throw new Error(`Path is not a directory: ${dir}`);
  }

  const pack = tar.pack();
  addEntries(pack, dir, '');
  pack.finalize();
  return pack;
}

function resolveInside(dir: string, name: string): string {
  const target = path.resolve(dir, name);
  if (target !== dir && !target.startsWith(dir + path.sep)) {
    throw new Error(`Archive entry escapes destination: ${name}`);
  }
  return target;
}

export interface Extraction {
  stream: tar.Extract;
  done: Promise<void>;
}

/**
 * Create a writable tar sink that unpacks into dir. `done` settles once
 * the archive has been fully written out or the sink is destroyed.
 */
export function extractTo(dir: string): Extraction {
  const root = path.resolve(dir);
  fs.mkdirSync(root, { recursive: true });
  const extract = tar.extract();

  extract.on('entry', (header, stream, next) => {
    let target: string;
    try {
      target = resolveInside(root, header.name);
    } catch (err) {
      stream.resume();
      extract.destroy(err instanceof Error ? err : new Error(String(err)));
      return;
    }

    if (header.type === 'directory') {
      fs.mkdirSync(target, { recursive: true });
      stream.resume();
      stream.on('end', next);
      return;
    }

    if (header.type === 'symlink' && header.linkname) {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.rmSync(target, { force: true });
      fs.symlinkSync(header.linkname, target);
      stream.resume();
      stream.on('end', next);
      return;
    }

    if (header.type !== 'file') {
      stream.resume();
      stream.on('end', next);
      return;
    }

    const chunks: Buffer[] = [];
    stream.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    stream.on('end', () => {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, Buffer.concat(chunks), { mode: header.mode ?? 0o644 });
      next();
    });
  });

  const done = new Promise<void>((resolve, reject) => {
    extract.on('finish', resolve);
    extract.on('error', reject);
    // Destroyed without an error: nothing more will be written
    extract.on('close', resolve);
  });

  return { stream: extract, done };
}
