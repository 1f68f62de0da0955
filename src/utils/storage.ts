import fs from "node:fs/promises";
import path from "node:path";

export async function readJson(filePath: string): Promise<unknown> {
	try {
		const content = await fs.readFile(filePath, "utf8");
		return JSON.parse(content);
	} catch (err: unknown) {
		if (err instanceof Error && "code" in err && err.code === "ENOENT") {
			return undefined;
		}
		throw err;
	}
}

/**
 * Writes the whole record to a sibling temp file and renames it over the
 * target, so readers see either the previous or the new content.
 */
export async function replaceJson(
	filePath: string,
	data: unknown,
): Promise<void> {
	await fs.mkdir(path.dirname(filePath), { recursive: true });
	const tmpPath = `${filePath}.${process.pid}.tmp`;
	await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
	await fs.rename(tmpPath, filePath);
}
