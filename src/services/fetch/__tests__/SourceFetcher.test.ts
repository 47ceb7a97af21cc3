import { Bearer } from '../../../domain/bearer/Bearer';
import { MalformedDocumentError } from '../../../utils/errors';
import { FailureReason, SourceFetcher, TransportError, orderCandidates } from '../SourceFetcher';

jest.mock('../../../utils/logger', () => ({
  createLogger: jest.fn().mockReturnValue({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));
jest.mock('../../../config/env', () => ({
  config: {
    http: {
      timeoutMs: 1000,
      userAgent: 'test-agent',
    },
  },
}));

const URL_SI = 'http://spi.example.com/radiodns/spi/3.1/SI.xml';

const SI = `<serviceInformation version="1">
  <services>
    <service>
      <shortName>One</shortName>
      <bearer id="dab:ce1.1234.c123.0"/>
    </service>
    <service>
      <shortName>Two</shortName>
      <bearer id="dab:ce1.1234.c456.0"/>
    </service>
  </services>
</serviceInformation>`;

const PI = `<epg>
  <schedule>
    <programme>
      <shortName>News</shortName>
      <location><time time="2026-10-18T06:00:00Z" duration="PT30M"/></location>
    </programme>
  </schedule>
</epg>`;

describe('SourceFetcher', () => {
  let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit?]>;
  let fetcher: SourceFetcher;

  const respond = (status: number, body: string | null = null) => {
    fetchMock.mockResolvedValue(new Response(body, { status }));
  };

  beforeEach(() => {
    fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
    fetcher = new SourceFetcher({ fetch: fetchMock, timeoutMs: 1000, userAgent: 'test-agent' });
  });

  describe('fetchBinary', () => {
    it('should return the response body', async () => {
      respond(200, 'image-bytes');

      const outcome = await fetcher.fetchBinary('http://img.example.com/logo.png');

      expect(outcome.status).toBe('found');
      expect(outcome.status === 'found' && outcome.value.toString()).toBe('image-bytes');
    });

    it('should send the user agent and no credential by default', async () => {
      respond(200, 'x');

      await fetcher.fetchBinary('http://img.example.com/logo.png');

      expect(fetchMock.mock.calls[0][0]).toBe('http://img.example.com/logo.png');
      expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'User-Agent': 'test-agent' });
    });

    it('should send the credential verbatim as the Authorization header', async () => {
      respond(200, 'x');

      await fetcher.fetchBinary(URL_SI, 'test-secret');

      expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
        'User-Agent': 'test-agent',
        Authorization: 'test-secret',
      });
    });

    it('should report 404 as not found', async () => {
      respond(404);

      await expect(fetcher.fetchBinary(URL_SI)).resolves.toEqual({ status: 'not-found', url: URL_SI });
    });

    it.each<[number, FailureReason]>([
      [401, 'authorization'],
      [403, 'authorization'],
      [500, 'authorization'],
      [503, 'transport'],
      [410, 'transport'],
    ])('should classify HTTP %i as %s', async (status, reason) => {
      respond(status);

      const outcome = await fetcher.fetchBinary(URL_SI);

      expect(outcome.status).toBe('failed');
      expect(outcome.status === 'failed' && outcome.reason).toBe(reason);
      expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(TransportError);
    });

    it('should report network errors as transport failures', async () => {
      fetchMock.mockRejectedValue(new Error('connect ECONNREFUSED'));

      const outcome = await fetcher.fetchBinary(URL_SI);

      expect(outcome).toEqual({
        status: 'failed',
        reason: 'transport',
        url: URL_SI,
        error: expect.any(TransportError),
      });
      expect(outcome.status === 'failed' && outcome.error.message).toBe('connect ECONNREFUSED');
    });
  });

  describe('fetchServiceInformation', () => {
    it('should keep only services carried on the requested bearers', async () => {
      respond(200, SI);

      const outcome = await fetcher.fetchServiceInformation(URL_SI, [new Bearer(0xe1, 0x1234, 0xc456, 0)]);

      expect(outcome.status).toBe('found');
      expect(outcome.status === 'found' && outcome.value.map((service) => service.names[0].text)).toEqual(['Two']);
    });

    it('should return an empty list when no service matches', async () => {
      respond(200, SI);

      const outcome = await fetcher.fetchServiceInformation(URL_SI, [new Bearer(0xe1, 0x1234, 0xc789, 0)]);

      expect(outcome).toEqual({ status: 'found', value: [] });
    });

    it('should report unparseable documents as malformed', async () => {
      respond(200, '<serviceInformation><services>');

      const outcome = await fetcher.fetchServiceInformation(URL_SI, []);

      expect(outcome.status === 'failed' && outcome.reason).toBe('malformed');
      expect(outcome.status === 'failed' && outcome.error).toBeInstanceOf(MalformedDocumentError);
    });

    it('should pass fetch failures through', async () => {
      respond(404);

      await expect(fetcher.fetchServiceInformation(URL_SI, [])).resolves.toEqual({ status: 'not-found', url: URL_SI });
    });
  });

  describe('fetchProgrammeInformation', () => {
    it('should parse the schedule', async () => {
      respond(200, PI);

      const outcome = await fetcher.fetchProgrammeInformation('http://spi.example.com/pi.xml');

      expect(outcome.status === 'found' && outcome.value.schedules[0].programmes[0].locations[0].times[0]).toEqual({
        time: new Date('2026-10-18T06:00:00Z'),
        duration: 1800,
      });
    });

    it('should report a document of the wrong type as malformed', async () => {
      respond(200, SI);

      const outcome = await fetcher.fetchProgrammeInformation('http://spi.example.com/pi.xml');

      expect(outcome.status === 'failed' && outcome.reason).toBe('malformed');
    });
  });
});

describe('orderCandidates', () => {
  it('should order by priority ascending, then weight descending', () => {
    const ordered = orderCandidates([
      { priority: 20, weight: 10, port: 80, target: 'a.example.com' },
      { priority: 10, weight: 1, port: 80, target: 'b.example.com' },
      { priority: 10, weight: 50, port: 80, target: 'c.example.com' },
    ]);

    expect(ordered.map((candidate) => candidate.target)).toEqual(['c.example.com', 'b.example.com', 'a.example.com']);
  });
});
