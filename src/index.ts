#!/usr/bin/env node
import fs from 'fs/promises';
import path from 'path';
import { config } from './config/env';
import { logger, logError, setLogLevel } from './utils/logger';
import { AppError, NoServicesFoundError } from './utils/errors';
import { CliOptions, USAGE, parseCliOptions } from './cli/options';
import { MuxConfigParser } from './infrastructure/muxconfig/MuxConfigParser';
import { DiscoveryResolver } from './infrastructure/radiodns/DiscoveryResolver';
import { MotDirectoryEncoder } from './infrastructure/mot/MotDirectoryEncoder';
import { ImageRecompressor } from './infrastructure/ffmpeg/ImageRecompressor';
import { SpiXmlWriter } from './infrastructure/spi/SpiXmlWriter';
import { SourceFetcher } from './services/fetch/SourceFetcher';
import { CredentialStore } from './services/fetch/CredentialStore';
import { ImageNormalizer } from './services/image/ImageNormalizer';
import { ServiceAggregator } from './services/aggregate/ServiceAggregator';
import { DirectoryAssembler } from './services/assemble/DirectoryAssembler';
import { CarouselBuilder } from './services/carousel/CarouselBuilder';

class Application {
  private readonly builder: CarouselBuilder;

  constructor() {
    const fetcher = new SourceFetcher();
    const writer = new SpiXmlWriter();
    this.builder = new CarouselBuilder({
      muxConfigParser: new MuxConfigParser(),
      resolver: new DiscoveryResolver(),
      aggregator: new ServiceAggregator({
        fetcher,
        imageNormalizer: new ImageNormalizer({ fetcher, recompressor: new ImageRecompressor() }),
        writer,
      }),
      assembler: new DirectoryAssembler({ writer }),
      encoder: new MotDirectoryEncoder(),
    });
  }

  public async run(options: CliOptions): Promise<void> {
    if (options.verbose) {
      setLogLevel('debug');
    }

    const credentials = options.credentials
      ? await CredentialStore.load(options.credentials)
      : CredentialStore.empty();

    logger.info(
      { app: config.app.name, muxConfig: options.muxConfig, days: options.days, policy: config.discovery.sourcePolicy },
      'Building EPG carousel'
    );

    const carousel = await this.builder.build(options.muxConfig, {
      days: options.days,
      packetSize: options.packetSize,
      address: options.address,
      dataGroupsOnly: options.dataGroups,
      credentials,
      sourcePolicy: config.discovery.sourcePolicy,
    });

    const outputPath = path.resolve(options.output);
    const data = Buffer.concat(carousel.fragments);
    await fs.writeFile(outputPath, data);
    logger.info({ output: outputPath, bytes: data.length, objects: carousel.objects.length }, 'Wrote carousel');
  }
}

async function main(): Promise<void> {
  let command: ReturnType<typeof parseCliOptions>;
  try {
    command = parseCliOptions(process.argv.slice(2));
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  try {
    await new Application().run(command.options);
  } catch (error) {
    if (error instanceof NoServicesFoundError) {
      logger.error(error.message + '; no output written');
    } else if (error instanceof AppError) {
      logError(error, { code: error.code });
    } else {
      logError(error instanceof Error ? error : new Error(String(error)));
    }
    process.exitCode = 1;
  }
}

void main();
