import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AssistantClient, type FetchLike } from '../src/agent/client.js';
import { RequestDispatcher } from '../src/agent/dispatch.js';
import { jsonResponse, stubFetch } from './helpers.js';

function clientWith(fetch: FetchLike, timeout = 1000): AssistantClient {
  return new AssistantClient({ baseUrl: 'http://assistant.test/', timeout, fetch });
}

const hanging: FetchLike = (_input, init) =>
  new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('aborted')));
  });

describe('AssistantClient.send', () => {
  it('操作ごとのエンドポイントにペイロードを送る', async () => {
    const requests: Array<{ url: string; body: unknown }> = [];
    const client = clientWith(async (input, init) => {
      const body: unknown = JSON.parse(String(init.body));
      requests.push({ url: input, body });
      return jsonResponse({ fixed_code: 'x = 1' });
    });

    const res = await client.send('fix', 'sess-1', { snippet: 'x = 1;', language: 'python' });

    assert.deepEqual(res, { ok: true, value: 'x = 1' });
    assert.deepEqual(requests, [
      {
        url: 'http://assistant.test/fix',
        body: { session_id: 'sess-1', snippet: 'x = 1;', programming_lang: 'python' },
      },
    ]);
  });

  it('questionがあれば一緒に送る', async () => {
    let sent: unknown;
    const client = clientWith(async (_input, init) => {
      sent = JSON.parse(String(init.body));
      return jsonResponse({ explanation: 'ok' });
    });
    await client.send('explain', 'sess-1', { snippet: 'f()', language: 'text', question: 'why?' });
    assert.deepEqual(sent, { session_id: 'sess-1', snippet: 'f()', programming_lang: 'text', question: 'why?' });
  });

  it('method_completionはcompleted_methodを読む', async () => {
    const client = clientWith(async (input) => {
      assert.equal(input, 'http://assistant.test/method_completion');
      return jsonResponse({ completed_method: 'def f():\n    return 1' });
    });
    const res = await client.send('complete', 'sess-1', { snippet: 'def f():', language: 'python' });
    assert.deepEqual(res, { ok: true, value: 'def f():\n    return 1' });
  });

  it('期待するフィールドがなければUnexpectedResponseShape', async () => {
    const client = clientWith(async () => jsonResponse({ explanation: 'wrong endpoint' }));
    const res = await client.send('fix', 'sess-1', { snippet: 'x', language: 'text' });
    assert.equal(res.ok, false);
    if (!res.ok) {
      assert.equal(res.error.kind, 'UnexpectedResponseShape');
      assert.equal(res.error.message, 'Response is missing fixed_code');
    }
  });

  it('JSONでない本文はRequestFailure', async () => {
    const client = clientWith(async () => new Response('not json'));
    const res = await client.send('explain', 'sess-1', { snippet: 'x', language: 'text' });
    assert.equal(res.ok, false);
    if (!res.ok) {
      assert.equal(res.error.kind, 'RequestFailure');
      assert.equal(res.error.message, 'Failed to parse server response');
    }
  });

  it('通信エラーはRequestFailure', async () => {
    const client = clientWith(async () => {
      throw new TypeError('fetch failed');
    });
    const res = await client.send('explain', 'sess-1', { snippet: 'x', language: 'text' });
    assert.equal(res.ok, false);
    if (!res.ok) {
      assert.equal(res.error.kind, 'RequestFailure');
      assert.equal(res.error.message, '/explain failed: fetch failed');
    }
  });

  it('タイムアウトするとリクエストを中断してRequestFailureを返す', async () => {
    const client = clientWith(hanging, 20);
    const res = await client.send('explain', 'sess-1', { snippet: 'x', language: 'text' });
    assert.equal(res.ok, false);
    if (!res.ok) {
      assert.equal(res.error.kind, 'RequestFailure');
      assert.equal(res.error.message, '/explain timed out after 20ms');
    }
  });

  it('呼び出し側のシグナルでキャンセルできる', async () => {
    const client = clientWith(hanging, 5000);
    const controller = new AbortController();
    const pending = client.send('fix', 'sess-1', { snippet: 'x', language: 'text' }, controller.signal);
    controller.abort();
    const res = await pending;
    assert.equal(res.ok, false);
    if (!res.ok) assert.equal(res.error.kind, 'Cancelled');
  });

  it('未知のセッションは404のRequestFailureになる', async () => {
    const client = clientWith(stubFetch().fetch);
    const res = await client.send('explain', 'missing', { snippet: 'x', language: 'text' });
    assert.equal(res.ok, false);
    if (!res.ok) {
      assert.equal(res.error.kind, 'RequestFailure');
      assert.equal(res.error.message, '/explain returned HTTP 404: Session not found');
    }
  });
});

describe('AssistantClient.transcript', () => {
  it('セッションのassistant応答を連結して返す', async () => {
    const client = clientWith(stubFetch().fetch);
    const session = await client.startSession('a.py', 'print(1)');
    assert.ok(session.ok);
    await client.send('explain', session.value, { snippet: 'first', language: 'text' });
    await client.send('explain', session.value, { snippet: 'second', language: 'text' });

    const res = await client.transcript(session.value);
    assert.deepEqual(res, { ok: true, value: 'first\n\nsecond' });
  });
});

describe('RequestDispatcher', () => {
  it('同じセッションのリクエストは呼び出し順に1つずつ送る', async () => {
    const started: string[] = [];
    let releaseFirst: () => void = () => {};
    const client = clientWith(async (_input, init) => {
      const body: { snippet: string } = JSON.parse(String(init.body));
      started.push(body.snippet);
      if (body.snippet === 'first') {
        await new Promise<void>((resolve) => {
          releaseFirst = resolve;
        });
      }
      return jsonResponse({ explanation: body.snippet });
    });
    const dispatcher = new RequestDispatcher(client);

    const first = dispatcher.dispatch('explain', 'sess-1', 'first', 'text');
    const second = dispatcher.dispatch('explain', 'sess-1', 'second', 'text');
    await new Promise((resolve) => setImmediate(resolve));
    assert.deepEqual(started, ['first']);

    releaseFirst();
    assert.deepEqual(await first, { ok: true, value: 'first' });
    assert.deepEqual(await second, { ok: true, value: 'second' });
    assert.deepEqual(started, ['first', 'second']);
    assert.equal(dispatcher.pendingSessions, 0);
  });

  it('questionはexplainのときだけ送る', async () => {
    const bodies: unknown[] = [];
    const client = clientWith(async (_input, init) => {
      bodies.push(JSON.parse(String(init.body)));
      return jsonResponse({ fixed_code: 'y', explanation: 'y' });
    });
    const dispatcher = new RequestDispatcher(client);

    await dispatcher.dispatch('fix', 'sess-1', 'x', 'go', { question: 'ignored' });
    await dispatcher.dispatch('explain', 'sess-1', 'x', 'go', { question: 'what?' });

    assert.deepEqual(bodies, [
      { session_id: 'sess-1', snippet: 'x', programming_lang: 'go' },
      { session_id: 'sess-1', snippet: 'x', programming_lang: 'go', question: 'what?' },
    ]);
  });
});
