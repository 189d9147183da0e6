// File overview:
// - Purpose: OpenAPI document and documentation UIs.
// - Routes: /doc (Swagger UI), /api-docs/openapi.json, /redoc, /rapidoc, /scalar.
// - Reached from: `main.ts` bootstrap and the test app helper; skipped when docs are disabled (production).
import { INestApplication } from '@nestjs/common';
import { DocumentBuilder, OpenAPIObject, SwaggerModule } from '@nestjs/swagger';
import { API_KEY_HEADER } from '../auth/api-key.guard';
import { getVersionInfo } from '../version/version-info';

export const OPENAPI_JSON_PATH = '/api-docs/openapi.json';

export function createOpenApiDocument(app: INestApplication): OpenAPIObject {
  const info = getVersionInfo();
  const config = new DocumentBuilder()
    .setTitle(info.name)
    .setDescription('Item API with an api-key protected admin surface')
    .setVersion(info.version)
    .addApiKey({ type: 'apiKey', in: 'header', name: API_KEY_HEADER }, 'api_key')
    .build();
  return SwaggerModule.createDocument(app, config);
}

const pages: Record<string, (title: string) => string> = {
  '/redoc': (title) => `<!DOCTYPE html>
<html>
  <head><meta charset="utf-8"/><title>${title} - ReDoc</title></head>
  <body>
    <redoc spec-url="${OPENAPI_JSON_PATH}"></redoc>
    <script src="https://cdn.redoc.ly/redoc/latest/bundles/redoc.standalone.js"></script>
  </body>
</html>`,
  '/rapidoc': (title) => `<!DOCTYPE html>
<html>
  <head><meta charset="utf-8"/><title>${title} - RapiDoc</title>
    <script type="module" src="https://unpkg.com/rapidoc/dist/rapidoc-min.js"></script>
  </head>
  <body><rapi-doc spec-url="${OPENAPI_JSON_PATH}"></rapi-doc></body>
</html>`,
  '/scalar': (title) => `<!DOCTYPE html>
<html>
  <head><meta charset="utf-8"/><title>${title} - Scalar</title></head>
  <body>
    <script id="api-reference" data-url="${OPENAPI_JSON_PATH}"></script>
    <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
  </body>
</html>`,
};

export function setupApiDocs(app: INestApplication): void {
  const document = createOpenApiDocument(app);
  SwaggerModule.setup('doc', app, document, {
    jsonDocumentUrl: OPENAPI_JSON_PATH.slice(1),
  });

  const title = document.info.title;
  const httpAdapter = app.getHttpAdapter();
  for (const [route, render] of Object.entries(pages)) {
    const html = render(title);
    httpAdapter.get(route, (_req: unknown, res: unknown) => {
      httpAdapter.setHeader(res, 'Content-Type', 'text/html; charset=utf-8');
      httpAdapter.reply(res, html, 200);
    });
  }
}
