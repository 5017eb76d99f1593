import { type ConfigError, type Site, configError, formatZodIssues, sitesFileSchema } from '@mention-watch/shared';
import { Result, err, ok } from 'neverthrow';
import { readFileSync } from 'node:fs';

const readText = Result.fromThrowable(
    (path: string) => readFileSync(path, 'utf8'),
    (e) => configError(`Cannot read sites file: ${e instanceof Error ? e.message : String(e)}`, e),
);

const parseJson = Result.fromThrowable(
    (text: string): unknown => JSON.parse(text),
    (e) => configError(`Sites file is not valid JSON: ${e instanceof Error ? e.message : String(e)}`, e),
);

/** Reads `{ "sites": [{ name, user, token }] }` from `path`. */
export function loadSites(path: string): Result<Site[], ConfigError> {
    return readText(path)
        .andThen(parseJson)
        .andThen((body): Result<Site[], ConfigError> => {
            const parsed = sitesFileSchema.safeParse(body);
            if (!parsed.success) {
                return err(configError(`Invalid sites file ${path}: ${formatZodIssues(parsed.error)}`, parsed.error));
            }
            return ok(parsed.data.sites.map((site): Site => Object.freeze({ ...site })));
        });
}
