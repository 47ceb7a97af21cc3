import { Service } from '../../../domain/spi/ServiceInformation';
import { MediaItem } from '../../../domain/spi/common';
import { CredentialStore } from '../../fetch/CredentialStore';
import { SourceFetcher } from '../../fetch/SourceFetcher';
import {
  ACCEPTED_DIMENSIONS,
  ImageNormalizer,
  acceptedDimensions,
  claimLogoStem,
  classify,
  logoBaseName,
} from '../ImageNormalizer';

jest.mock('fluent-ffmpeg');
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
    ffmpeg: { path: '/usr/bin/ffmpeg', probePath: '/usr/bin/ffprobe' },
    paths: { temp: '/tmp/epg-carousel-test' },
    http: { timeoutMs: 1000, userAgent: 'test-agent' },
    logos: { maxBytes: 5120 },
  },
}));

const DOCUMENT_URL = 'http://spi.example.com/radiodns/spi/3.1/SI.xml';

function service(media: MediaItem[], shortName = 'Radio One'): Service {
  return {
    names: [{ kind: 'short', text: shortName }],
    descriptions: [],
    genres: [],
    media,
    bearers: [{ uri: 'dab:ce1.1234.c123.0' }],
    links: [],
    keywords: [],
  };
}

describe('ImageNormalizer', () => {
  let bodies: Record<string, string>;
  let fetchMock: jest.Mock<Promise<Response>, [string, RequestInit?]>;
  let recompressor: { recompress: jest.Mock; dimensions: jest.Mock };

  const normalizer = (maxBytes = 1000) =>
    new ImageNormalizer({
      fetcher: new SourceFetcher({ fetch: fetchMock, timeoutMs: 1000, userAgent: 'test-agent' }),
      recompressor,
      maxBytes,
    });

  beforeEach(() => {
    bodies = {};
    fetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>(async (url) => {
      const body = bodies[url];
      return body === undefined ? new Response(null, { status: 404 }) : new Response(body, { status: 200 });
    });
    recompressor = { recompress: jest.fn(), dimensions: jest.fn() };
  });

  describe('logo selection', () => {
    const media: MediaItem[] = [
      { type: 'logo_colour_square', mimeType: 'image/png', width: 64, height: 64, url: 'http://img.example.com/a.png' },
      { mimeType: 'image/jpeg', width: 32, height: 32, url: 'http://img.example.com/b.jpg' },
      { mimeType: 'image/png', width: 320, height: 240, url: 'http://img.example.com/c.png' },
      { mimeType: 'image/png', width: 100, height: 100, url: 'http://img.example.com/d.png' },
      { type: 'logo_colour_rectangle', url: 'http://img.example.com/e.png' },
      { type: 'logo_unrestricted', mimeType: 'image/png', width: 128, height: 128, url: 'http://img.example.com/f.png' },
    ];

    beforeEach(() => {
      for (const item of media) {
        bodies[item.url] = `png-${item.url.slice(-5, -4)}`;
      }
    });

    it('should package accepted logos under generated names', async () => {
      const result = await normalizer().normalize(service(media), DOCUMENT_URL, CredentialStore.empty());

      expect(result.objects.map((object) => object.name)).toEqual([
        'Radio_On_0_32x32.png',
        'Radio_On_1_320x240.png',
        'Radio_On_2_112x32.png',
        'Radio_On_3_128x128.png',
      ]);
      expect(result.objects.map((object) => object.body.toString())).toEqual(['png-a', 'png-c', 'png-e', 'png-f']);
      expect(result.objects[0].contentType).toEqual({ type: 2, subtype: 3 });
      expect(result.objects[0].parameters).toEqual([]);
    });

    it('should point the service media at the packaged objects', async () => {
      const result = await normalizer().normalize(service(media), DOCUMENT_URL, CredentialStore.empty());

      expect(result.service.media).toEqual([
        { type: 'logo_colour_square', mimeType: 'image/png', width: 32, height: 32, url: 'Radio_On_0_32x32.png' },
        { type: 'logo_unrestricted', mimeType: 'image/png', width: 320, height: 240, url: 'Radio_On_1_320x240.png' },
        { type: 'logo_colour_rectangle', mimeType: 'image/png', width: 112, height: 32, url: 'Radio_On_2_112x32.png' },
        { type: 'logo_unrestricted', mimeType: 'image/png', width: 128, height: 128, url: 'Radio_On_3_128x128.png' },
      ]);
    });

    it('should leave the input service untouched', async () => {
      const input = service(media);

      await normalizer().normalize(input, DOCUMENT_URL, CredentialStore.empty());

      expect(input.media).toHaveLength(6);
      expect(input.media[0].url).toBe('http://img.example.com/a.png');
    });

    it('should drop a logo that cannot be fetched without renumbering the others', async () => {
      delete bodies['http://img.example.com/c.png'];

      const result = await normalizer().normalize(service(media), DOCUMENT_URL, CredentialStore.empty());

      expect(result.objects.map((object) => object.name)).toEqual([
        'Radio_On_0_32x32.png',
        'Radio_On_2_112x32.png',
        'Radio_On_3_128x128.png',
      ]);
      expect(result.service.media.map((item) => item.url)).toEqual([
        'Radio_On_0_32x32.png',
        'Radio_On_2_112x32.png',
        'Radio_On_3_128x128.png',
      ]);
    });
  });

  it('should give services with the same name stem distinct logo names', async () => {
    bodies['http://img.example.com/a.png'] = 'AAA';
    bodies['http://img.example.com/b.png'] = 'BBB';
    const claimed = new Set<string>();

    const first = await normalizer().normalize(
      service([{ type: 'logo_colour_square', url: 'http://img.example.com/a.png' }], 'Absolute Radio'),
      DOCUMENT_URL,
      CredentialStore.empty(),
      claimed
    );
    const second = await normalizer().normalize(
      service([{ type: 'logo_colour_square', url: 'http://img.example.com/b.png' }], 'Absolute 80s'),
      DOCUMENT_URL,
      CredentialStore.empty(),
      claimed
    );

    expect(first.objects.map((object) => [object.name, object.body.toString()])).toEqual([
      ['Absolute_0_32x32.png', 'AAA'],
    ]);
    expect(second.objects.map((object) => [object.name, object.body.toString()])).toEqual([
      ['Absolute-2_0_32x32.png', 'BBB'],
    ]);
    expect(second.service.media.map((item) => item.url)).toEqual(['Absolute-2_0_32x32.png']);
    expect(claimed).toEqual(new Set(['Absolute', 'Absolute-2']));
  });

  it('should not claim a name stem for a service without acceptable logos', async () => {
    const claimed = new Set<string>();

    await normalizer().normalize(service([]), DOCUMENT_URL, CredentialStore.empty(), claimed);

    expect(claimed.size).toBe(0);
  });

  it('should skip logos without a URL', async () => {
    const result = await normalizer().normalize(
      service([{ type: 'logo_colour_square', url: '' }]),
      DOCUMENT_URL,
      CredentialStore.empty()
    );

    expect(fetchMock).not.toHaveBeenCalled();
    expect(result.objects).toEqual([]);
    expect(result.service.media).toEqual([]);
  });

  it('should resolve relative logo URLs against the SI document', async () => {
    bodies['http://spi.example.com/radiodns/spi/3.1/logos/a.png'] = 'png';

    const result = await normalizer().normalize(
      service([{ type: 'logo_colour_square', url: 'logos/a.png' }]),
      DOCUMENT_URL,
      CredentialStore.empty()
    );

    expect(fetchMock.mock.calls[0][0]).toBe('http://spi.example.com/radiodns/spi/3.1/logos/a.png');
    expect(result.objects).toHaveLength(1);
  });

  it('should send the credential of the logo host', async () => {
    bodies['http://img.example.com/a.png'] = 'png';

    await normalizer().normalize(
      service([{ type: 'logo_colour_square', url: 'http://img.example.com/a.png' }]),
      DOCUMENT_URL,
      CredentialStore.fromCsv('img.example.com,test-secret')
    );

    expect(fetchMock.mock.calls[0][1]?.headers).toEqual({ 'User-Agent': 'test-agent', Authorization: 'test-secret' });
  });

  describe('oversized logos', () => {
    const logo: MediaItem = { type: 'logo_colour_square', url: 'http://img.example.com/big.png' };

    beforeEach(() => {
      bodies[logo.url] = 'x'.repeat(20);
      recompressor.dimensions.mockResolvedValue({ width: 32, height: 32 });
    });

    it('should use the recompressed image when it is smaller and the same size', async () => {
      recompressor.recompress.mockResolvedValue({ data: Buffer.alloc(12), dimensions: { width: 32, height: 32 } });

      const result = await normalizer(10).normalize(service([logo]), DOCUMENT_URL, CredentialStore.empty());

      expect(recompressor.recompress).toHaveBeenCalledWith(Buffer.from('x'.repeat(20)), 'Radio_On_0_32x32.png');
      expect(result.objects[0].body).toEqual(Buffer.alloc(12));
    });

    it('should keep the original when recompression does not shrink it', async () => {
      recompressor.recompress.mockResolvedValue({ data: Buffer.alloc(25), dimensions: { width: 32, height: 32 } });

      const result = await normalizer(10).normalize(service([logo]), DOCUMENT_URL, CredentialStore.empty());

      expect(result.objects[0].body.toString()).toBe('x'.repeat(20));
      expect(recompressor.dimensions).not.toHaveBeenCalled();
    });

    it('should keep the original when recompression changes the picture size', async () => {
      recompressor.recompress.mockResolvedValue({ data: Buffer.alloc(12), dimensions: { width: 16, height: 16 } });

      const result = await normalizer(10).normalize(service([logo]), DOCUMENT_URL, CredentialStore.empty());

      expect(result.objects[0].body.toString()).toBe('x'.repeat(20));
    });

    it('should leave the logo out when recompression fails', async () => {
      recompressor.recompress.mockRejectedValue(new Error('ffmpeg exited with code 1'));

      const result = await normalizer(10).normalize(service([logo]), DOCUMENT_URL, CredentialStore.empty());

      expect(result.objects).toEqual([]);
      expect(result.service.media).toEqual([]);
    });

    it('should not recompress logos within the limit', async () => {
      await normalizer(20).normalize(service([logo]), DOCUMENT_URL, CredentialStore.empty());

      expect(recompressor.recompress).not.toHaveBeenCalled();
    });
  });
});

describe('classify', () => {
  it('should classify by final pixel size', () => {
    expect(ACCEPTED_DIMENSIONS.map(classify)).toEqual([
      'logo_colour_square',
      'logo_colour_rectangle',
      'logo_unrestricted',
      'logo_unrestricted',
      'logo_unrestricted',
    ]);
  });
});

describe('acceptedDimensions', () => {
  it('should force typed square and rectangle logos to their canonical size', () => {
    expect(acceptedDimensions({ type: 'logo_colour_square', width: 600, height: 600, url: 'a' })).toEqual({
      width: 32,
      height: 32,
    });
    expect(acceptedDimensions({ type: 'logo_colour_rectangle', url: 'a' })).toEqual({ width: 112, height: 32 });
  });

  it('should reject items with an empty URL', () => {
    expect(acceptedDimensions({ type: 'logo_colour_square', url: '' })).toBeNull();
    expect(acceptedDimensions({ mimeType: 'image/png', width: 32, height: 32, url: '  ' })).toBeNull();
  });

  it('should require PNG media with listed dimensions otherwise', () => {
    expect(acceptedDimensions({ mimeType: 'image/png', width: 600, height: 600, url: 'a' })).toEqual({
      width: 600,
      height: 600,
    });
    expect(acceptedDimensions({ mimeType: 'image/png', url: 'a' })).toBeNull();
    expect(acceptedDimensions({ mimeType: 'image/gif', width: 32, height: 32, url: 'a' })).toBeNull();
    expect(acceptedDimensions({ type: 'logo_unrestricted', mimeType: 'image/png', width: 64, height: 64, url: 'a' })).toBeNull();
  });
});

describe('logoBaseName', () => {
  it('should shorten the display name and replace whitespace', () => {
    expect(logoBaseName(service([], 'Radio One'))).toBe('Radio_On');
    expect(logoBaseName(service([], 'Jazz'))).toBe('Jazz');
  });

  it('should keep only ASCII letters, digits, dashes and underscores', () => {
    expect(logoBaseName(service([], 'Café FM'))).toBe('Caf__FM');
    expect(logoBaseName(service([], 'Ράδιο'))).toBe('service');
    expect(logoBaseName(service([], 'Rock-FM!'))).toBe('Rock-FM_');
  });

  it('should fall back to longer names and then a fixed stem', () => {
    const longOnly: Service = { ...service([]), names: [{ kind: 'long', text: 'My Long Station' }] };

    expect(logoBaseName(longOnly)).toBe('My_Long_');
    expect(logoBaseName({ ...service([]), names: [] })).toBe('service');
  });
});

describe('claimLogoStem', () => {
  it('should hand out the base first and numbered variants after it', () => {
    const claimed = new Set<string>(['Radio-2']);

    expect(claimLogoStem('Radio', claimed)).toBe('Radio');
    expect(claimLogoStem('Radio', claimed)).toBe('Radio-3');
    expect(claimLogoStem('Jazz', claimed)).toBe('Jazz');
    expect(claimed).toEqual(new Set(['Radio-2', 'Radio', 'Radio-3', 'Jazz']));
  });
});
