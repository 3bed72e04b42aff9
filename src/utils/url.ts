import { URL } from 'node:url';

/** Host of a URL in lower case without `www.`, or '' when it cannot be parsed. */
export function bareHost(rawUrl: string): string {
  let candidate = rawUrl.trim();
  if (candidate.startsWith('//')) {
    candidate = `https:${candidate}`;
  } else if (!/^https?:\/\//i.test(candidate)) {
    candidate = `https://${candidate}`;
  }

  try {
    const host = new URL(candidate).hostname.toLowerCase();
    return host.startsWith('www.') ? host.slice(4) : host;
  } catch {
    return '';
  }
}
