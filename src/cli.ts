import { cac } from 'cac';
import path from 'path';
import { z } from 'zod';
import { BlueskyClient, EnvCredentialProvider } from './clients/BlueskyClient';
import { ExifToolReader } from './clients/ExifToolReader';
import { NodeGeocoderClient } from './clients/NodeGeocoderClient';
import { SharpMediaPreparer } from './clients/SharpMediaPreparer';
import { type AppConfig, ConfigError, loadConfig } from './config';
import { JsonGeocodeCache } from './services/GeocodeCache';
import { GeocodeResolver } from './services/GeocodeResolver';
import { MetadataExtractor } from './services/MetadataExtractor';
import { JsonNamedPlaces } from './services/NamedPlaces';
import { PhotoScanner } from './services/PhotoScanner';
import { PostComposer } from './services/PostComposer';
import { JsonPublicationLedger } from './services/PublicationLedger';
import { Publisher } from './services/Publisher';
import { PublishPipeline } from './services/PublishPipeline';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';

interface CommonOptions {
  dataDir?: string;
}

interface PublishOptions extends CommonOptions {
  dryRun?: boolean;
  force?: string | string[];
  caption?: string;
  nonRecursive?: boolean;
}

interface PlacesOptions extends CommonOptions {
  lat?: string | number;
  lon?: string | number;
}

interface CacheOptions extends CommonOptions {
  clear?: boolean;
}

// mri reads "--lon -122.4" as two flags, so the help asks for "--lon=-122.4"
const placeCoordinatesSchema = z.object({
  lat: z.coerce.number().min(-90).max(90),
  lon: z.coerce.number().min(-180).max(180),
});

function readConfig(options: CommonOptions): AppConfig {
  const config = loadConfig(process.env, { dataDir: options.dataDir });
  logger.level = config.logLevel;
  return config;
}

async function openGeocoding(config: AppConfig): Promise<{ resolver: GeocodeResolver; cache: JsonGeocodeCache }> {
  const cache = new JsonGeocodeCache(config.geocodeCachePath, {
    maxEntries: config.geocoder.cacheMaxEntries,
    maxAgeMs: config.geocoder.cacheMaxAgeMs,
  });
  await cache.load();
  const namedPlaces = await JsonNamedPlaces.open(config.namedPlacesPath);

  const resolver = new GeocodeResolver(
    new NodeGeocoderClient({
      provider: config.geocoder.provider,
      apiKey: config.geocoder.apiKey,
      email: config.geocoder.email,
      language: config.geocoder.language,
    }),
    cache,
    {
      precision: config.geocoder.precision,
      rateLimitDelay: config.geocoder.rateLimitDelay,
      retry: config.retry,
      namedPlaces,
      namedPlaceRadiusMeters: config.geocoder.namedPlaceRadiusMeters,
    }
  );
  return { resolver, cache };
}

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  return (Array.isArray(value) ? value : [value]).map(String);
}

async function publishCommand(folder: string, options: PublishOptions): Promise<number> {
  const config = readConfig(options);
  const photos = await new PhotoScanner().scan(folder, { recursive: !options.nonRecursive });
  logger.info({ folder, count: photos.length }, '🔎 Scan complete');

  if (photos.length === 0) {
    logger.warn('⚠️  No photos found');
    return 0;
  }

  const ledger = await JsonPublicationLedger.open(config.ledgerPath);
  const { resolver, cache } = await openGeocoding(config);
  const reader = new ExifToolReader();

  const pipeline = new PublishPipeline({
    extractor: new MetadataExtractor(reader),
    resolver,
    composer: new PostComposer({ maxLength: config.post.maxLength }),
    publisher: new Publisher(
      new BlueskyClient({
        service: config.bluesky.service,
        credentials: new EnvCredentialProvider(config.bluesky),
        media: new SharpMediaPreparer({
          maxDimension: config.media.maxDimension,
          quality: config.media.quality,
        }),
      }),
      { retry: config.retry }
    ),
    ledger,
  });

  try {
    const summary = await pipeline.run(photos, {
      dryRun: options.dryRun ?? false,
      force: toList(options.force),
      caption: options.caption === undefined ? undefined : String(options.caption),
    });

    for (const failure of summary.failures) {
      logger.error({ identity: failure.identity, path: failure.path }, `❌ ${failure.reason}`);
    }
    if (summary.aborted) {
      logger.error(`🛑 Run aborted: ${summary.aborted.reason}`);
    }
    logger.info(
      `📊 ${summary.published} published, ${summary.skipped} skipped, ${summary.failed} failed, `
      + `${summary.notAttempted} not attempted (of ${summary.total})`
    );
    const { named, hits, misses, size } = summary.geocoding;
    logger.info(
      { geocoding: summary.geocoding },
      `📍 ${named} named places, ${hits} cache hits, ${misses} lookups (${size} places cached)`
    );

    return summary.aborted || summary.failed > 0 ? 1 : 0;
  } finally {
    await cache.flush();
    await reader.close();
  }
}

async function statusCommand(options: CommonOptions): Promise<number> {
  const config = readConfig(options);
  const ledger = await JsonPublicationLedger.open(config.ledgerPath);
  const stats = ledger.stats();

  logger.info({ ledger: config.ledgerPath, ...stats }, `📒 ${stats.total} photos in the ledger`);
  for (const record of ledger.all()) {
    if (record.status === 'failed' || record.status === 'pending') {
      logger.warn({ identity: record.identity, path: record.path, attempts: record.attempts },
        `${record.status}: ${record.lastError ?? 'interrupted'}`);
    }
  }
  return 0;
}

async function locateCommand(photo: string, options: CommonOptions): Promise<number> {
  const config = readConfig(options);
  const reader = new ExifToolReader();
  const { resolver, cache } = await openGeocoding(config);

  try {
    const metadata = await new MetadataExtractor(reader).extract(path.resolve(photo));
    if (!metadata.coordinates) {
      logger.warn({ photo }, '📍 No GPS coordinates in this photo');
      return 1;
    }
    const place = await resolver.resolve(metadata.coordinates);
    logger.info({ photo, ...metadata.coordinates, captureTime: metadata.captureTime }, `📍 ${place ?? 'Unknown place'}`);
    return 0;
  } finally {
    await cache.flush();
    await reader.close();
  }
}

async function placesCommand(action: string | undefined, args: string[], options: PlacesOptions): Promise<number> {
  const config = readConfig(options);
  const places = await JsonNamedPlaces.open(config.namedPlacesPath);

  switch (action ?? 'list') {
    case 'list': {
      const all = places.all();
      logger.info({ file: config.namedPlacesPath }, `🗺️  ${all.length} named places`);
      for (const place of all) {
        logger.info({ latitude: place.latitude, longitude: place.longitude }, place.name);
      }
      return 0;
    }
    case 'set': {
      const [name] = args;
      const coordinates = placeCoordinatesSchema.safeParse(options);
      if (name === undefined || !coordinates.success) {
        logger.error('Usage: places set <name> --lat=<latitude> --lon=<longitude>');
        return 1;
      }
      const place = await places.set(name, { latitude: coordinates.data.lat, longitude: coordinates.data.lon });
      logger.info({ latitude: place.latitude, longitude: place.longitude }, `📌 ${place.name} saved`);
      return 0;
    }
    case 'rename': {
      const [from, to] = args;
      if (from === undefined || to === undefined) {
        logger.error('Usage: places rename <name> <new-name>');
        return 1;
      }
      const place = await places.rename(from, to);
      logger.info(`📌 ${from} is now ${place.name}`);
      return 0;
    }
    case 'remove': {
      const [name] = args;
      if (name === undefined) {
        logger.error('Usage: places remove <name>');
        return 1;
      }
      await places.remove(name);
      logger.info(`🗑️  ${name} removed`);
      return 0;
    }
    default:
      logger.error(`Unknown places action "${action}" (list, set, rename, remove)`);
      return 1;
  }
}

async function cacheCommand(options: CacheOptions): Promise<number> {
  const config = readConfig(options);
  const { resolver, cache } = await openGeocoding(config);

  if (options.clear) {
    resolver.clearCache();
    await cache.flush();
  }
  const { size } = resolver.getCacheStats();
  logger.info({ file: config.geocodeCachePath }, `🗄️  ${size} places cached`);
  return 0;
}

/**
 * Parse `argv` and run the matched command. Resolves to the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  let exitCode = 0;
  const cli = cac('shutterpost');

  cli
    .command('publish <folder>', 'Publish the photos in a folder that have not been published yet')
    .option('--dry-run', 'Compose and log posts without publishing or touching the ledger')
    .option('--force <identity>', 'Publish this photo (identity or path) again; repeatable')
    .option('--caption <text>', 'Caption for every post instead of the embedded descriptions')
    .option('--non-recursive', 'Do not descend into subfolders')
    .option('--data-dir <dir>', 'Where the ledger and geocode cache live')
    .action(async (folder: string, options: PublishOptions) => {
      exitCode = await publishCommand(folder, options);
    });

  cli
    .command('status', 'Show publication counts and unfinished photos')
    .option('--data-dir <dir>', 'Where the ledger and geocode cache live')
    .action(async (options: CommonOptions) => {
      exitCode = await statusCommand(options);
    });

  cli
    .command('locate <photo>', 'Print the place a single photo was taken')
    .option('--data-dir <dir>', 'Where the ledger and geocode cache live')
    .action(async (photo: string, options: CommonOptions) => {
      exitCode = await locateCommand(photo, options);
    });

  cli
    .command('places [action] [...args]', 'List, set, rename or remove the places you named')
    .option('--lat <latitude>', 'Latitude for "set"')
    .option('--lon <longitude>', 'Longitude for "set" (write negative values as --lon=-122.4)')
    .option('--data-dir <dir>', 'Where the ledger and geocode cache live')
    .example('shutterpost places set Home --lat=37.7749 --lon=-122.4194')
    .example('shutterpost places rename Home Apartment')
    .action(async (action: string | undefined, args: string[], options: PlacesOptions) => {
      exitCode = await placesCommand(action === undefined ? undefined : String(action), args.map(String), options);
    });

  cli
    .command('cache', 'Show the size of the geocode cache')
    .option('--clear', 'Forget every cached place')
    .option('--data-dir <dir>', 'Where the ledger and geocode cache live')
    .action(async (options: CacheOptions) => {
      exitCode = await cacheCommand(options);
    });

  cli.help();
  cli.parse(argv, { run: false });

  if (!cli.matchedCommand) {
    // cac has already printed the help for --help
    if (!cli.options.help) {
      cli.outputHelp();
    }
    return 0;
  }

  try {
    await cli.runMatchedCommand();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
    } else {
      logger.error({ error: describeError(error) }, '💥 Command failed');
    }
    return 1;
  }
  return exitCode;
}
