import * as fs from "node:fs/promises";
import * as path from "node:path";

const IMAGE_MIME_TYPES: Record<string, string> = {
	".png": "image/png",
	".jpg": "image/jpeg",
	".jpeg": "image/jpeg",
	".gif": "image/gif",
	".webp": "image/webp",
};

export function imageMimeType(filePath: string): string | undefined {
	return IMAGE_MIME_TYPES[path.extname(filePath).toLowerCase()];
}

/** Read an image into a `data:` URL. Throws for formats vision models don't take. */
export async function readImageAsDataUrl(filePath: string): Promise<string> {
	const mimeType = imageMimeType(filePath);
	if (!mimeType) {
		throw new Error(`Unsupported image format ${path.extname(filePath) || "(none)"}: ${filePath}`);
	}
	const bytes = await fs.readFile(filePath);
	return `data:${mimeType};base64,${bytes.toString("base64")}`;
}
