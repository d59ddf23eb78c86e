import { renderTemplate, unresolvedPlaceholders } from '../utils/template.js';
import { GenerationError } from '../utils/errors.js';
import type { StaticServer } from './plan.js';

export interface StaticServerDefinition {
  image: string;
  documentRoot: string;
  configPath: string;
  template: string;
}

export interface RenderedStaticServer {
  image: string;
  documentRoot: string;
  configPath: string;
  config: string;
}

const CADDYFILE = `:{{port}} {
    root * {{documentRoot}}
    encode gzip
{{#if isSpa}}    try_files {path} /index.html
{{/if}}    file_server
}
`;

const NGINX_CONF = `server {
    listen {{port}};
    server_name _;
    root {{documentRoot}};
    index index.html;

    location / {
        try_files $uri $uri/ {{#if isSpa}}/index.html{{else}}=404{{/if}};
    }
}
`;

export const STATIC_SERVER_DEFINITIONS: Record<StaticServer, StaticServerDefinition> = {
  caddy: {
    image: 'caddy:2-alpine',
    documentRoot: '/srv',
    configPath: '/etc/caddy/Caddyfile',
    template: CADDYFILE,
  },
  nginx: {
    image: 'nginx:1.27-alpine',
    documentRoot: '/usr/share/nginx/html',
    configPath: '/etc/nginx/conf.d/default.conf',
    template: NGINX_CONF,
  },
};

export const STATIC_PORT = '80';

export function renderStaticServer(
  server: StaticServer,
  options: { isSpa: boolean },
): RenderedStaticServer {
  const definition = STATIC_SERVER_DEFINITIONS[server];
  const config = renderTemplate(definition.template, {
    port: STATIC_PORT,
    documentRoot: definition.documentRoot,
    isSpa: options.isSpa,
  });

  const leftover = unresolvedPlaceholders(config);
  if (leftover.length > 0) {
    throw new GenerationError(
      'TemplateFailure',
      `${server} configuration has unresolved placeholders: ${leftover.join(', ')}`,
    );
  }

  return {
    image: definition.image,
    documentRoot: definition.documentRoot,
    configPath: definition.configPath,
    config,
  };
}
