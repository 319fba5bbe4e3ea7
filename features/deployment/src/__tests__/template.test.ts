/**
 * nginx template rendering tests
 */

import { readFile } from 'fs-extra';
import { join } from 'node:path';
import { TemplateError } from '@bgctl/shared';
import { renderProxyTemplate, type TemplateParams } from '../template.js';

const PARAMS: TemplateParams = {
  NGINX_PORT: '8080',
  ACTIVE_POOL: 'green',
  BACKUP_POOL: 'blue',
  APP_INTERNAL_PORT: '3000',
};

describe('renderProxyTemplate', () => {
  it('substitutes braced and bare parameters', () => {
    const template = [
      'server app_${ACTIVE_POOL}:${APP_INTERNAL_PORT};',
      'server app_$BACKUP_POOL:$APP_INTERNAL_PORT backup;',
      'listen ${NGINX_PORT};',
      '',
    ].join('\n');

    expect(renderProxyTemplate(template, PARAMS)).toBe(
      'server app_green:3000;\nserver app_blue:3000 backup;\nlisten 8080;\n',
    );
  });

  it('leaves nginx variables and unknown bare names alone', () => {
    const template = 'proxy_set_header Host $host;\nset $target $HOSTNAME;\n';
    expect(renderProxyTemplate(template, PARAMS)).toBe(template);
  });

  it('rejects an unknown braced parameter', () => {
    expect(() => renderProxyTemplate('listen ${PUBLIC_PORT};', PARAMS)).toThrow(
      new TemplateError('Unknown template parameter ${PUBLIC_PORT}'),
    );
  });

  it('rejects an unterminated ${ and names the line', () => {
    expect(() => renderProxyTemplate('server {\n  listen ${NGINX_PORT;\n}\n', PARAMS)).toThrow(
      'Unterminated ${ on template line 2',
    );
  });

  it('rejects an empty template', () => {
    expect(() => renderProxyTemplate('  \n', PARAMS)).toThrow('Proxy template is empty');
  });

  it('rejects an empty parameter value', () => {
    expect(() => renderProxyTemplate('listen ${NGINX_PORT};', { ...PARAMS, ACTIVE_POOL: '' })).toThrow(
      'Missing template parameter: ACTIVE_POOL',
    );
  });

  it('renders the shipped nginx template completely', async () => {
    const template = await readFile(join(__dirname, '..', '..', '..', '..', 'deploy', 'nginx', 'nginx.conf.template'), 'utf-8');

    const rendered = renderProxyTemplate(template, PARAMS);

    expect(rendered).not.toContain('${');
    const lines = rendered.split('\n').map((line) => line.trim());
    expect(lines).toContain('server app_green:3000 max_fails=1 fail_timeout=5s;');
    expect(lines).toContain('server app_blue:3000 backup;');
    expect(lines).toContain('listen 8080;');
    expect(lines).toContain('proxy_set_header Host $host;');
  });
});
