import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`../fixtures/${name}`, import.meta.url));
}

export function readFixture(name: string): string {
  return readFileSync(fixturePath(name), 'utf8');
}

/**
 * DER bytes of the first PEM block, decoded without the reader under test
 */
export function decodePemBody(pem: string): Buffer {
  const body = pem
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('-----'))
    .join('');
  return Buffer.from(body, 'base64');
}

interface GoldenToken {
  issuer: string | number;
  payloadJson: string;
  token: string;
}

export interface GoldenTokens {
  issuedAt: string;
  stringIssuer: GoldenToken;
  numericIssuer: GoldenToken;
}

export function loadGoldenTokens(): GoldenTokens {
  const parsed: GoldenTokens = JSON.parse(readFixture('golden-tokens.json'));
  return parsed;
}
