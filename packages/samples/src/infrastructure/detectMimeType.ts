/** Detect a MIME type from a file name or path based on its extension. */
export function detectMimeType(fileNameOrPath: string): string {
  const ext = fileNameOrPath.split('.').pop()?.toLowerCase();
  switch (ext) {
    case 'csv':
      return 'text/csv';
    case 'tsv':
      return 'text/tab-separated-values';
    case 'json':
      return 'application/json';
    case 'ndjson':
    case 'jsonl':
      return 'application/x-ndjson';
    default:
      return 'text/plain';
  }
}
