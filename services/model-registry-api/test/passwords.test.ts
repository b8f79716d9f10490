import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { basicAuthHeader, startTestServer, TestServer } from './helpers/test-server.js';

describe('GET /generate_password', () => {
  let server: TestServer;

  beforeAll(async () => {
    server = await startTestServer();
  });

  afterAll(async () => {
    await server.close();
  });

  function generate(query = ''): Promise<Response> {
    return fetch(`${server.baseUrl}/generate_password${query}`, {
      headers: { Authorization: basicAuthHeader() },
    });
  }

  it('should default to 12 alphanumeric characters', async () => {
    const response = await generate();
    const body = await response.json();

    expect(response.status).toBe(200);
    expect(body.data.password).toMatch(/^[A-Za-z0-9]{12}$/);
  });

  it('should honour length and special_chars', async () => {
    const body = await (await generate('?length=32&special_chars=true')).json();

    expect(body.data.password).toHaveLength(32);
    expect(body.data.password).toMatch(/[^A-Za-z0-9]/);
  });

  it('should read special_chars like other boolean query flags', async () => {
    for (const flag of ['1', 'YES', 'On']) {
      const body = await (await generate(`?length=64&special_chars=${flag}`)).json();
      expect(body.data.password).toMatch(/[^A-Za-z0-9]/);
    }
    for (const flag of ['0', 'No', 'OFF', 'False']) {
      const body = await (await generate(`?length=64&special_chars=${flag}`)).json();
      expect(body.data.password).toMatch(/^[A-Za-z0-9]{64}$/);
    }
  });

  it('should reject lengths outside the allowed range', async () => {
    const tooShort = await generate('?length=3');
    expect(tooShort.status).toBe(400);
    expect((await tooShort.json()).message).toBe('length must be between 4 and 128');

    const tooLong = await generate('?length=129');
    expect(tooLong.status).toBe(400);
  });

  it('should reject non-numeric lengths and unknown flags', async () => {
    expect((await generate('?length=twelve')).status).toBe(400);
    const unknownFlag = await generate('?special_chars=maybe');
    expect(unknownFlag.status).toBe(400);
    expect((await unknownFlag.json()).message).toBe(
      "special_chars must be a boolean (true/false, 1/0, yes/no, on/off), got 'maybe'"
    );
  });
});
