import { readFileSync } from 'fs';

// Same relative location from src/utils and dist/utils.
const packageJsonUrl = new URL('../../package.json', import.meta.url);

const readField = (manifest: unknown, field: string): string => {
	if (typeof manifest === 'object' && manifest !== null && field in manifest) {
		const value: unknown = Reflect.get(manifest, field);
		if (typeof value === 'string') {
			return value;
		}
	}
	return '';
};

const manifest: unknown = JSON.parse(readFileSync(packageJsonUrl, 'utf8'));

export const version = readField(manifest, 'version') || '0.0.0';
export const description = readField(manifest, 'description');
