import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { validateBody, validateFields } from '../../src/middleware/validate-body.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

const ctx: HandlerContext = { requestId: 'req-1' };

const echoHandler: Handler = async (req) => {
  const body = await req.json();
  return new Response(JSON.stringify(body), { status: 200 });
};

function makeReq(body: unknown): Request {
  return new Request('http://test', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

const schema: BodySchema = {
  fields: {
    claimDescription: { type: 'string', minLength: 10, maxLength: 100 },
    query: { type: 'string' },
    claimType: { type: 'string', enum: ['auto', 'property'] },
    claimAmount: { type: 'number', min: 0, max: 1_000_000 },
    urgent: { type: 'boolean' },
    documents: { type: 'array', items: 'string', maxLength: 3 },
    applicantData: { type: ['object', 'string'] },
  },
  oneOf: [['claimDescription', 'query']],
};

const errorBody = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    details: z.object({ fields: z.array(z.string()) }).optional(),
  }),
});

async function errorOf(res: Response): Promise<z.infer<typeof errorBody>['error']> {
  return errorBody.parse(await res.json()).error;
}

describe('validateBody', () => {
  const wrapped = validateBody(schema)(echoHandler);

  it('should pass a valid body through to the handler', async () => {
    const body = {
      claimDescription: 'Rear-ended at a junction',
      claimType: 'auto',
      claimAmount: 4200,
      urgent: false,
      documents: ['police report'],
      applicantData: { age: 40 },
    };
    const res = await wrapped(makeReq(body), ctx);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(body);
  });

  it('should reject invalid JSON', async () => {
    const res = await wrapped(makeReq('{not json'), ctx);
    expect(res.status).toBe(400);
    expect(await errorOf(res)).toEqual({
      code: 'INVALID_REQUEST',
      message: 'Request body must be valid JSON',
    });
  });

  it('should reject a non-object body', async () => {
    const res = await wrapped(makeReq([1, 2]), ctx);
    expect(res.status).toBe(400);
    expect((await errorOf(res)).message).toBe('Request body must be a JSON object');
  });

  it('should list every field error', async () => {
    const res = await wrapped(makeReq({ query: 'water damage', claimAmount: -5, urgent: 'yes' }), ctx);

    expect(res.status).toBe(400);
    const error = await errorOf(res);
    expect(error.details?.fields).toEqual(['claimAmount must be at least 0', 'urgent must be a boolean']);
    expect(error.message).toBe('claimAmount must be at least 0; urgent must be a boolean');
  });
});

describe('validateFields', () => {
  it('should require one field of each oneOf group', () => {
    expect(validateFields({ claimType: 'auto' }, schema)).toEqual([
      'one of claimDescription, query is required',
    ]);
  });

  it('should not count a blank string toward oneOf', () => {
    expect(validateFields({ query: '   ' }, schema)).toEqual([
      'one of claimDescription, query is required',
    ]);
  });

  it('should report required fields', () => {
    const required: BodySchema = { fields: { text: { type: 'string', required: true } } };
    expect(validateFields({}, required)).toEqual(['text is required']);
    expect(validateFields({ text: null }, required)).toEqual(['text is required']);
  });

  it('should apply string length bounds on trimmed and raw length', () => {
    expect(validateFields({ claimDescription: '   short   ' }, schema)).toEqual([
      'claimDescription must be at least 10 characters',
    ]);
    expect(validateFields({ claimDescription: 'x'.repeat(101) }, schema)).toEqual([
      'claimDescription must be 100 characters or less',
    ]);
  });

  it('should enforce enums', () => {
    expect(validateFields({ query: 'q', claimType: 'marine' }, schema)).toEqual([
      'claimType must be one of: auto, property',
    ]);
  });

  it('should enforce numeric bounds', () => {
    expect(validateFields({ query: 'q', claimAmount: 2_000_000 }, schema)).toEqual([
      'claimAmount must be at most 1000000',
    ]);
  });

  it('should reject non-finite numbers', () => {
    expect(validateFields({ query: 'q', claimAmount: Number.NaN }, schema)).toEqual([
      'claimAmount must be a number',
    ]);
  });

  it('should check array element types and length', () => {
    expect(validateFields({ query: 'q', documents: ['a', 2] }, schema)).toEqual([
      'documents must be an array of strings',
    ]);
    expect(validateFields({ query: 'q', documents: ['a', 'b', 'c', 'd'] }, schema)).toEqual([
      'documents must have at most 3 items',
    ]);
    expect(validateFields({ query: 'q', documents: 'a' }, schema)).toEqual([
      'documents must be an array',
    ]);
  });

  it('should accept any of several field types', () => {
    expect(validateFields({ query: 'q', applicantData: 'age 40' }, schema)).toEqual([]);
    expect(validateFields({ query: 'q', applicantData: { age: 40 } }, schema)).toEqual([]);
    expect(validateFields({ query: 'q', applicantData: 40 }, schema)).toEqual([
      'applicantData must be an object or string',
    ]);
  });

  it('should skip absent optional fields', () => {
    expect(validateFields({ query: 'q' }, schema)).toEqual([]);
  });
});
