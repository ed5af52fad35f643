import http from 'http';
import { GitHubOAuth2Session } from '@core/github/github-session';
import { githubPaginate } from '@core/github/paginate';

type RecordedRequest = {
  method: string;
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
};

const requests: RecordedRequest[] = [];

function startServer() {
  return new Promise<{ server: http.Server; baseUrl: string }>((resolve) => {
    const server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        const url = req.url || '';
        requests.push({
          method: req.method || '',
          url,
          headers: req.headers,
          body: Buffer.concat(chunks).toString('utf8')
        });

        const host = `http://${req.headers.host}`;

        if (req.method === 'GET' && url === '/user/repos?per_page=2') {
          res.writeHead(200, {
            'Content-Type': 'application/json',
            Link: `<${host}/user/repos?per_page=2&page=2>; rel="next", <${host}/user/repos?per_page=2&page=2>; rel="last"`
          });
          res.end(JSON.stringify([{ id: 1 }, { id: 2 }]));
          return;
        }

        if (req.method === 'GET' && url === '/user/repos?per_page=2&page=2') {
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify([{ id: 3 }]));
          return;
        }

        if (req.method === 'POST' && url === '/repos/acme/app/hooks') {
          res.writeHead(201, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ id: 99, active: true }));
          return;
        }

        if (req.method === 'GET' && url === '/user/orgs') {
          res.writeHead(401, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify({ message: 'Bad credentials' }));
          return;
        }

        res.writeHead(404, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ message: 'Not Found' }));
      });
    });

    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : 0;
      resolve({ server, baseUrl: `http://127.0.0.1:${port}` });
    });
  });
}

let server: http.Server;
let baseUrl: string;

beforeAll(async () => {
  const started = await startServer();
  server = started.server;
  baseUrl = started.baseUrl;
});

afterAll(async () => {
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

afterEach(() => {
  requests.length = 0;
});

function createSession() {
  return new GitHubOAuth2Session({ clientId: 'test-client', accessToken: 'test-token' });
}

test('GitHubOAuth2Session.get sends the bearer token and exposes links', async () => {
  const response = await createSession().get(`${baseUrl}/user/repos?per_page=2`);

  expect(response.status).toBe(200);
  expect(response.json()).toEqual([{ id: 1 }, { id: 2 }]);
  expect(response.links['next'].url).toBe(`${baseUrl}/user/repos?per_page=2&page=2`);

  const last = requests[requests.length - 1];
  expect(last.headers.authorization).toBe('bearer test-token');
  expect(last.headers['user-agent']).toMatch(/^repo-sync/);
});

test('githubPaginate follows absolute next links through the session', async () => {
  const items = await githubPaginate(createSession(), `${baseUrl}/user/repos?per_page=2`);

  expect(items).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }]);
  expect(requests.map((r) => r.url)).toEqual(['/user/repos?per_page=2', '/user/repos?per_page=2&page=2']);
  expect(requests.every((r) => r.headers.authorization === 'bearer test-token')).toBe(true);
});

test('GitHubOAuth2Session.post sends a JSON body', async () => {
  const response = await createSession().post(`${baseUrl}/repos/acme/app/hooks`, {
    json: { name: 'web', active: true, config: { url: 'https://sync.example.com/github', content_type: 'json' } }
  });

  expect(response.status).toBe(201);
  expect(response.json()).toEqual({ id: 99, active: true });

  const last = requests[requests.length - 1];
  expect(last.method).toBe('POST');
  expect(last.headers['content-type']).toBe('application/json');
  expect(JSON.parse(last.body)).toEqual({
    name: 'web',
    active: true,
    config: { url: 'https://sync.example.com/github', content_type: 'json' }
  });
});

test('GitHubOAuth2Session returns error statuses instead of throwing', async () => {
  const response = await createSession().get(`${baseUrl}/user/orgs`);

  expect(response.status).toBe(401);
  expect(response.ok).toBe(false);
  expect(response.json()).toEqual({ message: 'Bad credentials' });
});
