import fs from 'fs/promises';
import { Bearer } from '../../domain/bearer/Bearer';
import { EnsembleIdentity, Multiplex } from '../../domain/discovery/DiscoveryResponse';
import { MuxConfigError } from '../../utils/errors';
import { createLogger } from '../../utils/logger';
import { InfoNode, child, childValue, parseInfo } from './InfoFormat';

const logger = createLogger('MuxConfigParser');

/**
 * Reads a multiplexer configuration file and derives the ensemble identity and
 * the DAB bearer of every service component it carries.
 */
export class MuxConfigParser {
  public async load(filePath: string): Promise<Multiplex> {
    let source: string;
    try {
      source = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new MuxConfigError(`Cannot read multiplex configuration ${filePath}: ${error}`);
    }
    const multiplex = this.parse(source);
    logger.info(
      {
        file: filePath,
        ecc: multiplex.ensemble.ecc.toString(16),
        eid: multiplex.ensemble.eid.toString(16),
        bearers: multiplex.bearers.length,
      },
      'Loaded multiplex configuration'
    );
    return multiplex;
  }

  public parse(source: string): Multiplex {
    const root = parseInfo(source);
    const ensembleNode = root.find((node) => node.key === 'ensemble');
    if (!ensembleNode) {
      throw new MuxConfigError('No ensemble block');
    }

    const ensemble = this.parseEnsembleIdentity(ensembleNode);
    const services = new Map<string, { sid: number; ecc: number }>();

    for (const node of root.find((entry) => entry.key === 'services')?.children ?? []) {
      const id = childValue(node, 'id');
      if (id === undefined) {
        throw new MuxConfigError(`Service ${node.key} has no id`, node.line);
      }
      const ecc = childValue(node, 'ecc');
      services.set(node.key, {
        sid: parseNumber(id, node.line),
        ecc: ecc !== undefined ? parseNumber(ecc, node.line) : ensemble.ecc,
      });
    }

    const bearers: Bearer[] = [];
    const seen = new Set<string>();
    const add = (bearer: Bearer) => {
      if (!seen.has(bearer.uri)) {
        seen.add(bearer.uri);
        bearers.push(bearer);
      }
    };
    const referenced = new Set<string>();

    for (const node of root.find((entry) => entry.key === 'components')?.children ?? []) {
      const serviceKey = childValue(node, 'service');
      if (serviceKey === undefined) {
        throw new MuxConfigError(`Component ${node.key} has no service`, node.line);
      }
      const service = services.get(serviceKey);
      if (!service) {
        throw new MuxConfigError(`Component ${node.key} references unknown service ${serviceKey}`, node.line);
      }
      const scids = childValue(node, 'scids');
      referenced.add(serviceKey);
      add(this.bearer(service.ecc, ensemble.eid, service.sid, scids !== undefined ? parseNumber(scids, node.line) : 0, node));
    }

    // Services without a component are still announced on their primary component
    for (const [key, service] of services) {
      if (!referenced.has(key)) {
        add(this.bearer(service.ecc, ensemble.eid, service.sid, 0, undefined));
      }
    }

    return { ensemble, bearers };
  }

  private parseEnsembleIdentity(node: InfoNode): EnsembleIdentity {
    const id = childValue(node, 'id');
    const ecc = childValue(node, 'ecc');
    if (id === undefined || ecc === undefined) {
      throw new MuxConfigError('Ensemble needs both id and ecc', node.line);
    }
    const longName = childValue(node, 'label') ?? '';
    // shortlabel may be a block in newer configurations; only the plain form carries text
    const shortLabel = child(node, 'shortlabel')?.value;

    return {
      ecc: parseNumber(ecc, node.line),
      eid: parseNumber(id, node.line),
      longName,
      shortName: shortLabel ?? longName.slice(0, 8),
    };
  }

  private bearer(ecc: number, eid: number, sid: number, scids: number, node: InfoNode | undefined): Bearer {
    try {
      return new Bearer(ecc, eid, sid, scids);
    } catch (error) {
      throw new MuxConfigError(error instanceof Error ? error.message : String(error), node?.line);
    }
  }
}

/**
 * Decimal or 0x-prefixed hexadecimal integer
 */
export function parseNumber(text: string, line?: number): number {
  const value = /^0x[0-9a-f]+$/i.test(text) ? parseInt(text.slice(2), 16) : /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
  if (Number.isNaN(value)) {
    throw new MuxConfigError(`Not a number: ${text}`, line);
  }
  return value;
}
