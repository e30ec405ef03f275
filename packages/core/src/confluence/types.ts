/**
 * Confluence payloads. Content, spaces and attachments are passed through
 * in the service's own shape; only the fields read here are typed.
 */

export interface ContentVersion {
  number: number;
}

export interface ConfluenceContent {
  id: string;
  title: string;
  type?: string;
  status?: string;
  version?: ContentVersion;
  space?: { key: string; name?: string };
  body?: { storage?: { value: string; representation?: string } };
  [field: string]: unknown;
}

export type VersionedContent = ConfluenceContent & { version: ContentVersion };

export interface ConfluenceSpace {
  key: string;
  name: string;
  type?: string;
  [field: string]: unknown;
}

export interface ResultList<T> {
  results: T[];
  start?: number;
  limit?: number;
  size?: number;
}
