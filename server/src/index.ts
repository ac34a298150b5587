import http from 'http';

import chalk from 'chalk';

import { isMainModule } from '../../scripts/createScript.ts';
import { PROJECT_DATA_DIR } from '../../scripts/project-paths.ts';
import { loadReportFiles } from './reports.ts';

type ApiResponse = {
    status: number;
    body: Record<string, unknown>;
};

export function routeApiRequest({
    method,
    url,
    dataDir,
}: {
    method: string | undefined;
    url: string | undefined;
    dataDir: string;
}): ApiResponse {
    const { pathname } = new URL(url ?? '/', 'http://localhost');

    if (method === 'GET' && pathname === '/status') {
        return { status: 200, body: { ok: true } };
    }
    if (method === 'GET' && pathname === '/reports') {
        return { status: 200, body: { items: loadReportFiles(dataDir) } };
    }
    return { status: 404, body: { ok: false, error: 'Not found' } };
}

export function createApiServer(dataDir: string = PROJECT_DATA_DIR): http.Server {
    return http.createServer((request, response) => {
        const { status, body } = routeApiRequest({ method: request.method, url: request.url, dataDir });
        response.writeHead(status, { 'Content-Type': 'application/json; charset=utf-8' });
        response.end(JSON.stringify(body));
    });
}

if (isMainModule(import.meta.url)) {
    if (!process.env.API_PORT) throw new Error('process.env.API_PORT is not set');

    const port = Number(process.env.API_PORT);
    const server = createApiServer();
    server.listen(port, () => {
        console.log('Server running at:', chalk.cyan(`http://localhost:${port}/`));
    });
}
