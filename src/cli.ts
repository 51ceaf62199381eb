#!/usr/bin/env node

import * as fs from 'node:fs';
import * as path from 'node:path';
import { globby } from 'globby';
import { renderDocument } from './core/router.js';
import { describeFailure, outputPathFor, textReport, toJsonResult, type FileResult, type OutputFormat } from './core/format.js';

function printUsage() {
    console.log('Usage: mermaid-builder <file.json>');
    console.log('       cat file.json | mermaid-builder -');
    console.log('       mermaid-builder <directory>');
    console.log('  - Renders a JSON diagram document (flowchart, class or er) to Mermaid text');
    console.log('  - When a directory is given, renders every *.diagram.json to a sibling .mmd file');
    console.log('Options:');
    console.log('  --out, -o       Write the rendered text to a file instead of stdout');
    console.log('  --include, -I   Glob(s) to include (repeatable or comma-separated)');
    console.log('  --exclude, -E   Glob(s) to exclude (repeatable or comma-separated)');
    console.log('  --no-gitignore  Do not respect .gitignore when scanning directories');
    console.log('  --format, -f    Report format: text|json (default: text)');
    console.log('  --dry-run, -n   Render and report without writing files');
}

function readInput(arg: string): { content: string; filename: string } {
    if (arg === '-') {
        return { content: fs.readFileSync(0, 'utf8'), filename: '<stdin>' };
    }
    if (!fs.existsSync(arg)) {
        console.error(`File not found: ${arg}`);
        process.exit(1);
    }
    return { content: fs.readFileSync(arg, 'utf8'), filename: arg };
}

function isDirectory(p: string) {
    try { return fs.statSync(p).isDirectory(); } catch { return false; }
}

const DEFAULT_INCLUDE_GLOBS = ['**/*.diagram.json'];

const DEFAULT_IGNORE_DIRS = [
    '**/.git/**',
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/out/**',
    '**/coverage/**'
];

async function listCandidateFiles(root: string, includes: string[], excludes: string[], useGitignore: boolean): Promise<string[]> {
    const patterns = includes.length > 0 ? includes : DEFAULT_INCLUDE_GLOBS;
    const ignore = [
        ...excludes,
        ...(useGitignore ? [] : DEFAULT_IGNORE_DIRS),
    ];
    const files = await globby(patterns, {
        cwd: path.resolve(root),
        absolute: true,
        dot: true,
        gitignore: useGitignore,
        ignore,
        followSymbolicLinks: false,
    });
    return files.sort();
}

function renderSource(file: string, content: string): FileResult {
    try {
        return { file, output: renderDocument(JSON.parse(content)), errors: [] };
    } catch (error) {
        return { file, errors: describeFailure(error) };
    }
}

function splitGlobs(value: string): string[] {
    return value.split(',').map(s => s.trim()).filter(Boolean);
}

async function main() {
    const args = process.argv.slice(2);

    if (args.length === 0 || args[0] === '-h' || args[0] === '--help') {
        printUsage();
        process.exit(args.length === 0 ? 1 : 0);
    }

    // simple arg parsing: --format json|text, --out/-o <file>, --dry-run/-n,
    // directory options: --include/-I, --exclude/-E, --no-gitignore
    let format: OutputFormat = 'text';
    let outFile: string | null = null;
    let dryRun = false;
    const includeGlobs: string[] = [];
    const excludeGlobs: string[] = [];
    let useGitignore = true;
    const positionals: string[] = [];
    for (let i = 0; i < args.length; i++) {
        const a = args[i];
        if (a === '--format' || a === '-f') {
            const v = (args[i + 1] || '').toLowerCase();
            if (v === 'json' || v === 'text') { format = v; i++; continue; }
        }
        if (a === '--out' || a === '-o') {
            const v = args[i + 1];
            if (v) { outFile = v; i++; continue; }
        }
        if (a === '--dry-run' || a === '-n') { dryRun = true; continue; }
        if (a === '--include' || a === '-I') {
            const v = args[i + 1];
            if (v) { includeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--exclude' || a === '-E') {
            const v = args[i + 1];
            if (v) { excludeGlobs.push(...splitGlobs(v)); i++; continue; }
        }
        if (a === '--no-gitignore') { useGitignore = false; continue; }
        if (a === '--gitignore') { useGitignore = true; continue; }
        if (a === '-' || !a.startsWith('-')) positionals.push(a);
    }
    const target = positionals[0] || args[0];

    // Directory mode
    if (isDirectory(target)) {
        const files = await listCandidateFiles(target, includeGlobs, excludeGlobs, useGitignore);
        const results: FileResult[] = [];
        for (const file of files) {
            const result = renderSource(file, fs.readFileSync(file, 'utf8'));
            if (result.output !== undefined && !dryRun) {
                const dest = outputPathFor(file);
                fs.writeFileSync(dest, result.output, 'utf8');
                result.written = dest;
            }
            results.push(result);
        }
        const failed = results.filter(r => r.errors.length > 0);
        if (format === 'json') {
            const jsonFiles = results.map(toJsonResult);
            const errorCount = jsonFiles.reduce((n, jf) => n + jf.errorCount, 0);
            console.log(JSON.stringify({ valid: errorCount === 0, files: jsonFiles, errorCount, diagramCount: files.length }, null, 2));
        } else if (files.length === 0) {
            console.log('No diagram documents found.');
        } else {
            for (const r of results.filter(r => r.errors.length === 0)) console.log(textReport(r));
            // Ensure clear separation between files
            for (const r of failed) console.error(textReport(r).trimEnd());
            if (failed.length === 0) console.log(`Rendered ${results.length} diagram(s).`);
        }
        process.exit(failed.length === 0 ? 0 : 1);
    }

    // Single-file or stdin mode
    const { content, filename } = readInput(target);
    const result = renderSource(filename, content);
    if (result.output !== undefined && outFile && !dryRun) {
        fs.writeFileSync(outFile, result.output, 'utf8');
        result.written = outFile;
    }

    if (format === 'json') {
        console.log(JSON.stringify({ ...toJsonResult(result), output: result.output }, null, 2));
    } else if (result.errors.length > 0) {
        console.error(textReport(result).trimEnd());
    } else if (result.written) {
        console.log(textReport(result));
    } else if (result.output !== undefined) {
        process.stdout.write(result.output);
    }
    process.exit(result.errors.length === 0 ? 0 : 1);
}

main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.stack ?? err.message : String(err));
    process.exit(1);
});
