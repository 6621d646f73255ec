/**
 * Catalog Authentication
 *
 * The account session is a browser cookie copied from a logged-in request.
 * The headers file is either a JSON object of header names to values or the
 * raw "Name: value" lines from the browser's network panel.
 */

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { safeReadFile } from '@tunegrab/utils';
import { ConfigError } from '@tunegrab/core';
import type { CatalogAuth } from './types.js';

export const CATALOG_ORIGIN = 'https://music.youtube.com';

const headerObjectSchema = z.record(z.string(), z.union([z.string(), z.number()]));

export function parseHeaders(content: string): Map<string, string> {
  const headers = new Map<string, string>();
  const trimmed = content.trim();

  if (trimmed.startsWith('{')) {
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (error) {
      throw new ConfigError('Headers file is not valid JSON', { reason: String(error) });
    }
    const parsed = headerObjectSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError('Headers file must map header names to strings');
    }
    for (const [name, value] of Object.entries(parsed.data)) {
      headers.set(name.toLowerCase(), String(value));
    }
    return headers;
  }

  for (const line of trimmed.split(/\r?\n/)) {
    const separator = line.indexOf(':', 1);
    if (separator <= 0) {
      continue;
    }
    const name = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    if (name && value) {
      headers.set(name, value);
    }
  }
  return headers;
}

export function readCookie(cookie: string, name: string): string | undefined {
  for (const part of cookie.split(';')) {
    const [key, ...rest] = part.trim().split('=');
    if (key === name) {
      return rest.join('=');
    }
  }
  return undefined;
}

export function authFromHeaders(headers: Map<string, string>): CatalogAuth {
  const cookie = headers.get('cookie');
  if (!cookie) {
    throw new ConfigError('Headers file has no cookie header');
  }
  const sapisid = readCookie(cookie, '__Secure-3PAPISID') ?? readCookie(cookie, 'SAPISID');
  if (!sapisid) {
    throw new ConfigError('Cookie has no SAPISID; copy the headers from a logged-in request');
  }
  return {
    cookie,
    sapisid,
    authUser: headers.get('x-goog-authuser') ?? '0',
    userAgent: headers.get('user-agent'),
  };
}

export async function loadBrowserAuth(filePath: string): Promise<CatalogAuth> {
  const content = await safeReadFile(filePath);
  if (content === null) {
    throw new ConfigError(`Headers file not found: ${filePath}`, { filePath });
  }
  return authFromHeaders(parseHeaders(content));
}

/**
 * Value of the Authorization header for a cookie session
 */
export function sapisidHash(sapisid: string, timestampSeconds: number, origin: string = CATALOG_ORIGIN): string {
  const digest = createHash('sha1').update(`${timestampSeconds} ${sapisid} ${origin}`).digest('hex');
  return `SAPISIDHASH ${timestampSeconds}_${digest}`;
}
