import { AssembledObject, ContentTypes, findParameter } from '../../../domain/carousel/AssembledObject';
import { Service } from '../../../domain/spi/ServiceInformation';
import { SpiXmlReader } from '../../../infrastructure/spi/SpiXmlReader';
import { NoServicesFoundError } from '../../../utils/errors';
import { DirectoryAssembler, SERVICE_INFORMATION_NAME } from '../DirectoryAssembler';

jest.mock('../../../utils/logger', () => ({
  createLogger: jest.fn().mockReturnValue({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const ENSEMBLE = { ecc: 0xe1, eid: 0x1234, longName: 'Test Mux', shortName: 'TMux' };
const NOW = new Date('2026-10-18T08:00:00Z');

function service(name: string, bearers: string[]): Service {
  return {
    names: [{ kind: 'short', text: name }],
    descriptions: [],
    genres: [],
    media: [],
    bearers: bearers.map((uri) => ({ uri })),
    links: [],
    keywords: [],
  };
}

function object(name: string): AssembledObject {
  return { name, body: Buffer.from(name), contentType: ContentTypes.png, parameters: [] };
}

describe('DirectoryAssembler', () => {
  const assembler = new DirectoryAssembler();

  it('should append one SI object after the other objects', () => {
    const objects = assembler.assemble(
      [object('One_0_32x32.png'), object('20261018_ce1_1234_c123_0_PI.xml')],
      [service('One', ['dab:ce1.1234.c123.0'])],
      ENSEMBLE,
      NOW
    );

    expect(objects.map((entry) => entry.name)).toEqual([
      'One_0_32x32.png',
      '20261018_ce1_1234_c123_0_PI.xml',
      SERVICE_INFORMATION_NAME,
    ]);
  });

  it('should scope the SI object to the ensemble', () => {
    const objects = assembler.assemble([], [service('One', ['dab:ce1.1234.c123.0'])], ENSEMBLE, NOW);
    const serviceInformation = objects[objects.length - 1];

    expect(serviceInformation.name).toBe('SI.xml');
    expect(serviceInformation.contentType).toEqual({ type: 7, subtype: 0 });
    expect(serviceInformation.parameters).toHaveLength(1);
    expect(findParameter(serviceInformation, 'ScopeId')?.value).toEqual(Buffer.from([0xe1, 0x12, 0x34]));
  });

  it('should publish every service restricted to the multiplex bearers', () => {
    const objects = assembler.assemble(
      [],
      [
        service('One', ['dab:ce1.1234.c123.0', 'dab:ce1.4321.c123.0']),
        service('Elsewhere', ['dab:ce1.4321.c456.0']),
        service('Two', ['dab:ce1.1234.c456.1', 'http://stream.example.com/two.mp3']),
      ],
      ENSEMBLE,
      NOW
    );

    const document = new SpiXmlReader().readServiceInformation(objects[0].body);

    expect(document.services.map((entry) => [entry.names[0].text, entry.bearers.map((bearer) => bearer.uri)])).toEqual([
      ['One', ['dab:ce1.1234.c123.0']],
      ['Two', ['dab:ce1.1234.c456.1']],
    ]);
    expect(document.creationTime).toEqual(NOW);
  });

  it('should fail when no service is left', () => {
    expect(() => assembler.assemble([object('a.png')], [], ENSEMBLE, NOW)).toThrow(NoServicesFoundError);
    expect(() => assembler.assemble([], [service('Elsewhere', ['dab:ce1.4321.c456.0'])], ENSEMBLE, NOW)).toThrow(
      'No services found for ensemble e1.1234'
    );
  });

  it('should keep the first object of each name', () => {
    const first = object('One_0_32x32.png');
    const duplicate: AssembledObject = { ...object('One_0_32x32.png'), body: Buffer.from('other') };

    const objects = assembler.assemble(
      [first, duplicate, object(SERVICE_INFORMATION_NAME)],
      [service('One', ['dab:ce1.1234.c123.0'])],
      ENSEMBLE,
      NOW
    );

    expect(objects).toHaveLength(2);
    expect(objects[0]).toBe(first);
    expect(objects[1].contentType).toEqual(ContentTypes.serviceInformation);
  });
});
