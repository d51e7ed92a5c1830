import { errorMessage } from './textNormalizer.js';

const HEADERS = {
  'User-Agent': 'Mozilla/5.0 (compatible; FundingCallsBot/1.0)',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,application/pdf;q=0.8,*/*;q=0.7',
  'Accept-Language': 'en-US,en;q=0.9',
};

export interface HttpOptions {
  timeoutMs: number;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function request(url: string, { timeoutMs }: HttpOptions): Promise<Response | null> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, { signal: controller.signal, headers: HEADERS, redirect: 'follow' });
    if (!res.ok) {
      console.error(`   ❌ HTTP ${res.status} ${res.statusText} for ${url}`);
      return null;
    }
    return res;
  } catch (err) {
    console.error(`   ❌ Error fetching ${url}: ${errorMessage(err)}`);
    return null;
  } finally {
    clearTimeout(timeout);
  }
}

export async function fetchHtml(url: string, options: HttpOptions): Promise<string | null> {
  const res = await request(url, options);
  if (!res) return null;
  try {
    return await res.text();
  } catch (err) {
    console.error(`   ❌ Error reading ${url}: ${errorMessage(err)}`);
    return null;
  }
}

/** Downloads a binary body, giving up on anything larger than `maxBytes`. */
export async function fetchBytes(
  url: string,
  options: HttpOptions & { maxBytes: number },
): Promise<Uint8Array | null> {
  const res = await request(url, options);
  if (!res) return null;

  const declared = Number(res.headers.get('content-length') ?? '0');
  if (declared > options.maxBytes) {
    console.warn(`   ⚠️  Skipping ${url}: ${declared} bytes exceeds ${options.maxBytes}`);
    return null;
  }

  try {
    const body = new Uint8Array(await res.arrayBuffer());
    if (body.byteLength > options.maxBytes) {
      console.warn(`   ⚠️  Skipping ${url}: ${body.byteLength} bytes exceeds ${options.maxBytes}`);
      return null;
    }
    return body;
  } catch (err) {
    console.error(`   ❌ Error reading ${url}: ${errorMessage(err)}`);
    return null;
  }
}
