import path from 'path';
import { CovloopConfig } from '../config/schema';
import { fileExists } from './fileUtils';

export type LayoutConfig = CovloopConfig['layout'];

function toPosix(p: string): string {
    return p.replace(/\\/g, '/');
}

/**
 * Root of the project a source file belongs to: the directory above the
 * source tree, else the nearest ancestor holding the build file, else the
 * file's own directory.
 */
export async function extractProjectRoot(sourceFile: string, layout: LayoutConfig): Promise<string> {
    const absolute = toPosix(path.resolve(sourceFile));

    for (const marker of [`/${layout.source_dir}/`, '/src/']) {
        const index = absolute.indexOf(marker);
        if (index > 0) {
            return path.resolve(absolute.slice(0, index));
        }
    }

    let dir = path.dirname(path.resolve(sourceFile));
    while (true) {
        if (await fileExists(path.join(dir, layout.build_file))) {
            return dir;
        }
        const parent = path.dirname(dir);
        if (parent === dir) {
            break;
        }
        dir = parent;
    }
    return path.dirname(path.resolve(sourceFile));
}

/**
 * `src/main/java/com/x/Foo.java` -> `src/test/java/com/x/FooTest.java`
 */
export function calculateTestFilePath(sourceFile: string, projectRoot: string, layout: LayoutConfig): string {
    const ext = layout.source_extension;
    const absolute = path.resolve(sourceFile);
    const sourceRoot = path.join(projectRoot, layout.source_dir);
    const relative = path.relative(sourceRoot, absolute);

    const base = path.basename(absolute, ext);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
        // Outside the source tree: put the test beside the source
        return path.join(path.dirname(absolute), `${base}${layout.test_suffix}${ext}`);
    }
    return path.join(projectRoot, layout.test_dir, path.dirname(relative), `${base}${layout.test_suffix}${ext}`);
}

/**
 * Dotted class name from the path under the source tree
 */
export function extractClassName(sourceFile: string, projectRoot: string, layout: LayoutConfig): string {
    const absolute = path.resolve(sourceFile);
    const relative = path.relative(path.join(projectRoot, layout.source_dir), absolute);
    const withoutExt = relative.endsWith(layout.source_extension)
        ? relative.slice(0, -layout.source_extension.length)
        : relative;

    if (relative.startsWith('..') || path.isAbsolute(relative)) {
        return path.basename(absolute, layout.source_extension);
    }
    return toPosix(withoutExt).split('/').join('.');
}
