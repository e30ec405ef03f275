import { compileShape } from '../http/validate.js';
import type { ConfluenceContent, ConfluenceSpace, ResultList, VersionedContent } from './types.js';

const content = {
  type: 'object',
  required: ['id', 'title'],
  properties: {
    id: { type: 'string' },
    title: { type: 'string' },
    version: {
      type: 'object',
      required: ['number'],
      properties: { number: { type: 'integer' } },
    },
  },
} as const;

export const validateContent = compileShape<ConfluenceContent>(content);

export const validateVersionedContent = compileShape<VersionedContent>({
  ...content,
  required: ['id', 'title', 'version'],
});

export const validateContentList = compileShape<ResultList<ConfluenceContent>>({
  type: 'object',
  required: ['results'],
  properties: { results: { type: 'array', items: content } },
});

export const validateSpaceList = compileShape<ResultList<ConfluenceSpace>>({
  type: 'object',
  required: ['results'],
  properties: {
    results: {
      type: 'array',
      items: {
        type: 'object',
        required: ['key', 'name'],
        properties: { key: { type: 'string' }, name: { type: 'string' } },
      },
    },
  },
});
