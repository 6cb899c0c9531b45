import type { OutputFormat } from '../../types/config.js';

/**
 * `raw` hands the body back untouched. `json` re-indents a JSON body and
 * leaves anything else untouched.
 */
export function formatOutput(body: string, format: OutputFormat): string {
  if (format === 'raw') {
    return body;
  }

  try {
    return JSON.stringify(JSON.parse(body), null, 2);
  } catch {
    return body;
  }
}
