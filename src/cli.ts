#!/usr/bin/env node

import { existsSync, statSync } from 'node:fs';

import { buildPackage } from './build.js';
import { CliUsageError, USAGE, parseCliArgs, type BuildCommand, type CliCommand } from './cliArgs.js';
import { createBuildRequest } from './request.js';
import { errorMessage, isPackagerError } from './errors.js';
import { EXIT_FATAL, exitCodeFor, formatBuildReport, reportToJson } from './report.js';
import { detectToolchain } from './backend/detectToolchain.js';
import { getCacheRoot } from './cache/cachePaths.js';
import { cacheStats, cleanCache } from './cache/cacheManager.js';
import { loadOptionalConfig, type PyshipConfig } from './dx/config.js';
import { isTraceEnabled, traceError } from './dx/trace.js';

function usage() {
	console.log(USAGE);
}

function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

function humanBytes(bytes: number) {
	const u = ['B', 'KB', 'MB', 'GB'];
	let b = bytes;
	let i = 0;
	while (b >= 1024 && i < u.length - 1) {
		b /= 1024;
		i++;
	}
	return `${b.toFixed(i === 0 ? 0 : 1)} ${u[i]}`;
}

function fatal(err: unknown): never {
	const error = err instanceof Error ? err : new Error(String(err));
	console.error(`[pyship] ${isPackagerError(error) ? `${error.code}: ` : ''}${error.message}`);
	traceError('cli.fatal', { message: error.message });
	if (isTraceEnabled()) console.error(error);
	process.exit(exitCodeFor(error));
}

function doctor(config: PyshipConfig | null) {
	const lines: string[] = [];
	try {
		const tc = detectToolchain(config?.python);
		lines.push(fmtOk(`Python detected (${tc.python.version} at ${tc.python.path})`));
		if (tc.cython) lines.push(fmtOk(`Cython ${tc.cython} importable (pyd/so builds)`));
		else lines.push(fmtFail(`Cython missing (install with: ${tc.python.path} -m pip install Cython)`));
		if (tc.pyinstaller) lines.push(fmtOk(`PyInstaller ${tc.pyinstaller} importable (exe builds)`));
		else lines.push(fmtFail(`PyInstaller missing (install with: ${tc.python.path} -m pip install pyinstaller)`));
	} catch (e) {
		lines.push(fmtFail(`Python detection failed: ${errorMessage(e)}`));
	}

	lines.push(fmtOk('zip builds need no external tool'));

	// cache directory health
	const root = getCacheRoot(config?.cacheDir);
	try {
		const st = existsSync(root) ? statSync(root) : null;
		if (!st) lines.push(fmtOk(`Cache directory will be created at ${root}`));
		else if (st.isDirectory()) lines.push(fmtOk(`Cache directory OK (${root})`));
		else lines.push(fmtFail(`Cache path is not a directory: ${root}`));
	} catch (e) {
		lines.push(fmtFail(`Cache directory not accessible: ${errorMessage(e)}`));
	}

	console.log(lines.join('\n'));
	process.exit(lines.some((l) => l.startsWith('✗')) ? 1 : 0);
}

function cache(action: 'status' | 'clean', config: PyshipConfig | null) {
	const root = getCacheRoot(config?.cacheDir);
	if (action === 'clean') {
		cleanCache(root);
		console.log(fmtOk('Cache cleaned'));
		process.exit(0);
	}

	if (!existsSync(root)) {
		console.log(fmtOk(`Cache empty (missing dir: ${root})`));
		process.exit(0);
	}
	const stats = cacheStats(root);
	const lastAccess = stats.lastAccessAt ? new Date(stats.lastAccessAt).toISOString() : 'n/a';
	console.log(fmtOk(`Cache entries: ${stats.entries}`));
	console.log(fmtOk(`Disk usage: ${humanBytes(stats.bytes)}`));
	console.log(fmtOk(`Last access: ${lastAccess}`));
	process.exit(0);
}

async function build(cmd: BuildCommand, config: PyshipConfig | null) {
	const request = createBuildRequest(cmd.input);

	const controller = new AbortController();
	process.once('SIGINT', () => {
		console.error('[pyship] interrupted, stopping running backends...');
		controller.abort();
	});

	const report = await buildPackage(request, {
		config,
		signal: controller.signal,
		useCache: cmd.useCache,
		concurrency: cmd.concurrency,
	});

	if (cmd.json) console.log(JSON.stringify(reportToJson(report), null, 2));
	else console.log(formatBuildReport(report));
	process.exit(exitCodeFor(report));
}

async function main() {
	let cmd: CliCommand;
	try {
		cmd = parseCliArgs(process.argv.slice(2));
	} catch (e) {
		if (!(e instanceof CliUsageError)) throw e;
		console.error(e.message);
		usage();
		process.exit(EXIT_FATAL);
	}

	if (cmd.command === 'help') {
		usage();
		process.exit(0);
	}

	const config = await loadOptionalConfig(process.cwd());

	if (cmd.command === 'doctor') doctor(config);
	if (cmd.command === 'cache') cache(cmd.action, config);
	if (cmd.command === 'build') await build(cmd, config);
}

main().catch(fatal);
