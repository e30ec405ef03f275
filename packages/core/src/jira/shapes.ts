/**
 * JSON schemas for the Jira payloads in ./types.ts.
 */

import { compileShape } from '../http/validate.js';
import type {
  CreatedComment,
  CreatedIssue,
  JiraProject,
  RawIssue,
  RawSearchPage,
  RawTransition,
} from './types.js';

const named = { type: 'object', properties: { name: { type: 'string' } } } as const;
const user = { type: 'object', properties: { displayName: { type: 'string' } } } as const;
const nullableString = { type: 'string', nullable: true } as const;
const nullableNumber = { type: 'number', nullable: true } as const;

const linkedIssue = {
  type: 'object',
  required: ['key'],
  properties: {
    key: { type: 'string' },
    fields: {
      type: 'object',
      properties: { summary: { type: 'string' }, status: named },
    },
  },
} as const;

const issue = {
  type: 'object',
  required: ['id', 'key', 'fields'],
  properties: {
    id: { type: 'string' },
    key: { type: 'string' },
    fields: {
      type: 'object',
      properties: {
        summary: { type: 'string' },
        description: nullableString,
        status: named,
        priority: { ...named, nullable: true },
        assignee: { ...user, nullable: true },
        created: { type: 'string' },
        updated: { type: 'string' },
        duedate: nullableString,
        resolutiondate: nullableString,
        timeestimate: nullableNumber,
        timespent: nullableNumber,
        labels: { type: 'array', items: { type: 'string' } },
        components: { type: 'array', items: named },
        comment: {
          type: 'object',
          properties: {
            comments: {
              type: 'array',
              items: { type: 'object', properties: { author: user, body: { type: 'string' } } },
            },
          },
        },
        issuelinks: {
          type: 'array',
          items: {
            type: 'object',
            properties: { type: named, outwardIssue: linkedIssue, inwardIssue: linkedIssue },
          },
        },
      },
    },
    changelog: {
      type: 'object',
      properties: {
        histories: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              created: { type: 'string' },
              author: user,
              items: {
                type: 'array',
                items: {
                  type: 'object',
                  properties: {
                    field: { type: 'string' },
                    fromString: nullableString,
                    toString: nullableString,
                  },
                },
              },
            },
          },
        },
      },
    },
  },
} as const;

export const validateIssue = compileShape<RawIssue>(issue);

export const validateSearchPage = compileShape<RawSearchPage>({
  type: 'object',
  required: ['issues'],
  properties: {
    issues: { type: 'array', items: issue },
    nextPageToken: { type: 'string' },
  },
});

export const validateTransitions = compileShape<{ transitions: RawTransition[] }>({
  type: 'object',
  required: ['transitions'],
  properties: {
    transitions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'name'],
        properties: { id: { type: 'string' }, name: { type: 'string' } },
      },
    },
  },
});

const project = {
  type: 'object',
  required: ['id', 'key', 'name'],
  properties: { id: { type: 'string' }, key: { type: 'string' }, name: { type: 'string' } },
} as const;

export const validateProject = compileShape<JiraProject>(project);

export const validateProjectList = compileShape<JiraProject[]>({ type: 'array', items: project });

export const validateCreatedIssue = compileShape<CreatedIssue>({
  type: 'object',
  required: ['id', 'key'],
  properties: { id: { type: 'string' }, key: { type: 'string' } },
});

export const validateCreatedComment = compileShape<CreatedComment>({
  type: 'object',
  required: ['id', 'body'],
  properties: { id: { type: 'string' }, body: { type: 'string' } },
});
