// Order matters: the first pattern that matches anywhere in the input wins.
const SURL_PATTERNS = [
  /\/s\/([a-zA-Z0-9_-]+)/,
  /surl=([a-zA-Z0-9_-]+)/,
  /\/wap\/share\/file\?surl=([a-zA-Z0-9_-]+)/
];

export function extractSurl(url: string): string | undefined {
  for (const pattern of SURL_PATTERNS) {
    const match = pattern.exec(url);
    if (match) {
      return match[1];
    }
  }
  return undefined;
}
