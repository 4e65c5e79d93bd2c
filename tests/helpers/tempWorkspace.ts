import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export type TempDirHandle = {
	dir: string;
	release: () => Promise<void>;
};

export async function acquireTempDir(prefix = "parley-test-"): Promise<TempDirHandle> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
	let done = false;
	return {
		dir,
		release: async () => {
			if (done) return;
			done = true;
			await fs.rm(dir, { recursive: true, force: true });
		},
	};
}

export async function withTempDir<T>(
	fn: (dir: string) => Promise<T>,
	prefix = "parley-test-"
): Promise<T> {
	const handle = await acquireTempDir(prefix);
	try {
		return await fn(handle.dir);
	} finally {
		await handle.release();
	}
}
