// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';

/**
 * Fresh directory under the OS temp dir. Callers remove it in afterEach.
 */
export function makeTempDir(label = 'dirplate-test-'): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), label));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, {recursive: true, force: true});
}

/**
 * Write files (and their parent folders) below `root`. A key ending in
 * "/" creates an empty folder.
 */
export function writeTree(root: string, files: Record<string, string>): void {
    for (const [rel, content] of Object.entries(files)) {
        const abs = path.join(root, rel);
        if (rel.endsWith('/')) {
            fs.mkdirSync(abs, {recursive: true});
            continue;
        }
        fs.mkdirSync(path.dirname(abs), {recursive: true});
        fs.writeFileSync(abs, content, 'utf8');
    }
}

/**
 * Every entry below `root` as a sorted list of POSIX relative paths;
 * folders end in "/", links are listed but not followed.
 */
export function listTree(root: string): string[] {
    const out: string[] = [];
    const walk = (dir: string, rel: string) => {
        for (const dirent of fs.readdirSync(dir, {withFileTypes: true})) {
            const childRel = rel ? `${rel}/${dirent.name}` : dirent.name;
            if (dirent.isDirectory()) {
                out.push(`${childRel}/`);
                walk(path.join(dir, dirent.name), childRel);
            } else {
                out.push(childRel);
            }
        }
    };
    walk(root, '');
    return out.sort();
}

export function readText(file: string): string {
    return fs.readFileSync(file, 'utf8');
}

/**
 * Contents of every regular file below `root`, keyed by POSIX relative path.
 */
export function readFiles(root: string): Record<string, Buffer> {
    const files: Record<string, Buffer> = {};
    for (const rel of listTree(root)) {
        const abs = path.join(root, rel);
        if (!rel.endsWith('/') && fs.lstatSync(abs).isFile()) {
            files[rel] = fs.readFileSync(abs);
        }
    }
    return files;
}
