const BLOCKED_PATH_PATTERNS: RegExp[] = [
  /\/ads?\//i,
  /\/advertentie/i,
  /\/adverteren\b/i,
  /\/sponsored\//i,
  /\/tracking\//i,
  /\/consent\//i,
  /\/privacy\b/i,
  /\/cookies?\b/i,
  /\/contact\b/i,
  /\/help\b/i,
  /\/faq\b/i,
  /\/account\b/i,
  /\/mijn[-_]?account\b/i,
  /\/login\b/i,
  /\/inloggen\b/i,
  /\/registreren\b/i,
  /\/rss\b/i,
  /\/feed\b/i
];

const BLOCKED_EXTENSIONS = [
  '.gif',
  '.jpg',
  '.jpeg',
  '.png',
  '.svg',
  '.ico',
  '.webp',
  '.mp4',
  '.mp3',
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  '.zip',
  '.rar',
  '.gz',
  '.xml',
  '.css',
  '.js'
];

export function isBlockedUrl(candidateUrl: string): boolean {
  let parsedUrl: URL;
  try {
    parsedUrl = new URL(candidateUrl);
  } catch {
    return true;
  }

  if (!parsedUrl.hostname) return true;

  const pathname = parsedUrl.pathname.toLowerCase();
  if (BLOCKED_PATH_PATTERNS.some(pattern => pattern.test(pathname))) return true;

  return BLOCKED_EXTENSIONS.some(extension => pathname.endsWith(extension));
}
