import { defineSuite } from '@core/harness/suite.ts';
import type { HarnessFixtures } from '@/fixtures/index.ts';
import { ipJsonSchema, isIpAddress } from '@/schemas/ipEcho.ts';
import { expect } from 'chai';

/** Plain-text IP echo service */
export const IP_ECHO_URL = 'https://ip.me';
/** JSON IP service */
export const IP_JSON_URL = 'https://api.ipify.org';

const TEXT = { headers: { Accept: 'text/plain' } };

const PRIVATE_PREFIXES = ['127.', '10.', '192.168.'];

/**
 * Client IP echo services, text and JSON
 */
export const ipEchoSuite = defineSuite<HarnessFixtures>(
  { name: 'ip echo', category: 'api', file: 'src/suites/api/ipEcho.ts' },
  (s) => {
    s.test(
      'ip address as text',
      ['http'],
      async ({ http }) => {
        const response = await http.get(IP_ECHO_URL, TEXT);

        expect(response.status).to.equal(200);
        expect(isIpAddress(response.text.trim()), response.text).to.equal(true);
      },
      { tags: ['smoke'] }
    );

    s.test('ip address as json', ['http'], async ({ http }) => {
      const response = await http.get(IP_JSON_URL, { params: { format: 'json' } });

      expect(response.status).to.equal(200);
      expect(response.parse(ipJsonSchema).ip).to.not.be.empty;
    });

    s.test('response headers', ['http'], async ({ http }) => {
      const response = await http.get(IP_ECHO_URL);

      expect(response.headers.has('content-type')).to.equal(true);
      expect(response.headers.has('server')).to.equal(true);
      expect(response.elapsedMs).to.be.below(5000);
    });

    s.each(
      ['/', '/ip', '/whois'],
      (endpoint) => `endpoint ${endpoint} is available`,
      ['http'],
      async ({ http }, endpoint) => {
        const response = await http.get(`${IP_ECHO_URL}${endpoint}`, { timeoutMs: 10_000 });
        expect(response.status).to.equal(200);
      }
    );

    s.test('custom user agent', ['http'], async ({ http }) => {
      const response = await http.get(IP_ECHO_URL, {
        headers: { 'User-Agent': 'harness/1.0 automation' },
      });

      expect(response.status).to.equal(200);
      expect(response.text).to.not.be.empty;
    });

    s.test(
      'same address across requests',
      ['http'],
      async ({ http }) => {
        const addresses = new Set<string>();
        for (let i = 0; i < 3; i++) {
          const response = await http.get(IP_ECHO_URL, TEXT);
          expect(response.status).to.equal(200);
          addresses.add(response.text.trim());
        }

        expect(addresses.size).to.equal(1);
      },
      { tags: ['slow'] }
    );

    s.test('ipv4 octets are in range', ['http'], async ({ http }) => {
      const address = (await http.get(IP_ECHO_URL, TEXT)).text.trim();
      if (!address.includes('.')) return;

      const octets = address.split('.');
      expect(octets).to.have.lengthOf(4);
      for (const octet of octets) {
        expect(octet).to.match(/^\d+$/);
        expect(Number(octet)).to.be.within(0, 255);
      }
    });

    s.test('response time', ['http'], async ({ http }) => {
      const response = await http.get(IP_ECHO_URL);

      expect(response.status).to.equal(200);
      expect(response.elapsedMs).to.be.below(3000);
    });

    s.test('json address is not private', ['http'], async ({ http }) => {
      const response = await http.get(IP_JSON_URL, { params: { format: 'json' } });
      expect(response.status).to.equal(200);

      const { ip } = response.parse(ipJsonSchema);
      for (const prefix of PRIVATE_PREFIXES) {
        expect(ip.startsWith(prefix), `${ip} starts with ${prefix}`).to.equal(false);
      }
    });

    s.test('unknown path still answers', ['http'], async ({ http }) => {
      const response = await http.get(`${IP_ECHO_URL}/nonexistent`);
      expect(response.status).to.equal(200);
    });

    s.test('options request', ['http'], async ({ http }) => {
      const response = await http.options(`${IP_ECHO_URL}/api`);
      expect(response.status).to.equal(200);
    });

    s.test('head request has no body', ['http'], async ({ http }) => {
      const response = await http.head(IP_ECHO_URL);

      expect(response.status).to.equal(200);
      expect(response.text).to.equal('');
    });

    s.test(
      'rate limiting',
      ['http'],
      async ({ http }) => {
        const statuses: number[] = [];
        for (let i = 0; i < 20; i++) {
          statuses.push((await http.get(`${IP_ECHO_URL}/api`)).status);
        }
        expect(statuses.filter((status) => status === 429 || status === 503)).to.be.empty;
      },
      { skip: 'may trigger rate limiting' }
    );
  }
);
