/** Shared spawn+collect+timeout helper for worker launchers. */

import { spawn, type ChildProcessByStdio } from "node:child_process";
import type { Readable } from "node:stream";

export interface SpawnOptions {
	env?: NodeJS.ProcessEnv;
	cwd?: string;
	timeout: number; // milliseconds
	killGraceMs?: number;
	signal?: AbortSignal;
}

export interface SpawnResult {
	stdout: string;
	stderr: string;
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	timedOut: boolean;
	aborted: boolean;
	launchError?: string;
	startedAt: Date;
	finishedAt: Date;
	wallTimeMs: number;
}

/**
 * Spawn a child process, collect stdout/stderr, enforce a timeout, and
 * return the collected output.  SIGTERM is sent on timeout or abort,
 * followed by SIGKILL after `killGraceMs` (1 second by default).  On POSIX
 * the worker gets its own process group and signals go to the whole group,
 * so helper processes it forked are stopped with it.
 *
 * Never rejects. A process that cannot be created comes back with
 * `launchError` set and whatever timing was observed.
 */
export function spawnWithTimeout(
	cmd: string,
	args: string[],
	opts: SpawnOptions,
): Promise<SpawnResult> {
	const startedAt = new Date();
	const killGraceMs = opts.killGraceMs ?? 1000;
	const groupKill = process.platform !== "win32";

	return new Promise<SpawnResult>((resolve) => {
		let stdout = "";
		let stderr = "";
		let timedOut = false;
		let aborted = false;
		let settled = false;
		let timer: NodeJS.Timeout | undefined;
		let killTimer: NodeJS.Timeout | undefined;

		const finish = (
			exitCode: number | null,
			signal: NodeJS.Signals | null,
			launchError?: string,
		): void => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			clearTimeout(killTimer);
			opts.signal?.removeEventListener("abort", onAbort);
			const finishedAt = new Date();
			resolve({
				stdout,
				stderr,
				exitCode,
				signal,
				timedOut,
				aborted,
				...(launchError !== undefined ? { launchError } : {}),
				startedAt,
				finishedAt,
				wallTimeMs: finishedAt.getTime() - startedAt.getTime(),
			});
		};

		if (opts.signal?.aborted) {
			aborted = true;
			finish(null, null);
			return;
		}

		let child: ChildProcessByStdio<null, Readable, Readable>;
		try {
			child = spawn(cmd, args, {
				env: opts.env,
				cwd: opts.cwd,
				stdio: ["ignore", "pipe", "pipe"],
				detached: groupKill,
			});
		} catch (err) {
			finish(null, null, err instanceof Error ? err.message : String(err));
			return;
		}

		const signalWorker = (sig: NodeJS.Signals): void => {
			if (groupKill && child.pid !== undefined) {
				try {
					process.kill(-child.pid, sig);
					return;
				} catch {
					// Group already gone; fall back to the direct child.
				}
			}
			child.kill(sig);
		};

		const terminate = (): void => {
			signalWorker("SIGTERM");
			killTimer = setTimeout(() => signalWorker("SIGKILL"), killGraceMs);
		};

		function onAbort(): void {
			aborted = true;
			terminate();
		}

		// Decode per stream so a character split across chunks stays whole.
		child.stdout.setEncoding("utf8");
		child.stderr.setEncoding("utf8");

		child.stdout.on("data", (data: string) => {
			stdout += data;
		});

		child.stderr.on("data", (data: string) => {
			stderr += data;
		});

		timer = setTimeout(() => {
			timedOut = true;
			terminate();
		}, opts.timeout);

		opts.signal?.addEventListener("abort", onAbort, { once: true });

		child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
			finish(code, signal);
		});

		child.on("error", (err: Error) => {
			// Spawn failures never produce a pid; errors after a successful
			// spawn (e.g. a failed kill) are left to the close handler.
			if (child.pid === undefined) {
				finish(null, null, err.message);
			}
		});
	});
}
