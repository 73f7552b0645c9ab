import * as fs from 'fs/promises';
import * as path from 'path';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { ImportError, errorMessage } from '../../errors.js';
import type { GeoPoint } from '../../geo/types.js';
import { createLogger } from '../../utils/logger.js';

const log = createLogger('GpxImporter');

/**
 * Extracts raw waypoints from a recorded track file
 */
export interface TrackImporter {
  importTrack(filePath: string): Promise<GeoPoint[]>;
}

const ACCEPTED_EXTENSIONS = new Set(['.gpx', '.xml']);

const trkptSchema = z.object({
  '@_lat': z.coerce.number(),
  '@_lon': z.coerce.number(),
  ele: z.coerce.number().optional(),
});

// An empty <trkseg/> parses to an empty string rather than an object
const trksegSchema = z.union([
  z.object({ trkpt: z.array(trkptSchema).default([]) }),
  z.string().transform(() => ({ trkpt: [] })),
]);

const gpxSchema = z.object({
  gpx: z.object({
    trk: z
      .array(
        z.union([
          z.object({ trkseg: z.array(trksegSchema).default([]) }),
          z.string().transform(() => ({ trkseg: [] })),
        ]),
      )
      .default([]),
  }),
});

export class GpxTrackImporter implements TrackImporter {
  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    removeNSPrefix: true,
    isArray: (name) => name === 'trk' || name === 'trkseg' || name === 'trkpt',
  });

  /**
   * Points of the first segment of the first track. A point without an
   * elevation repeats the previous point's altitude.
   */
  public async importTrack(filePath: string): Promise<GeoPoint[]> {
    const extension = path.extname(filePath).toLowerCase();
    if (!ACCEPTED_EXTENSIONS.has(extension)) {
      throw new ImportError(`Invalid file type. Accepted: xml, gpx. Received: ${extension || 'none'}`);
    }

    let xml: string;
    try {
      xml = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw new ImportError(`Could not read ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    const points = this.parsePoints(xml);
    log.info(`Imported ${points.length} track points from ${path.basename(filePath)}`);
    return points;
  }

  public parsePoints(xml: string): GeoPoint[] {
    let document: unknown;
    try {
      document = this.parser.parse(xml);
    } catch (error) {
      throw new ImportError(`Malformed GPX: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = gpxSchema.safeParse(document);
    if (!parsed.success) {
      throw new ImportError(`Unexpected GPX structure: ${parsed.error.message}`);
    }

    const track = parsed.data.gpx.trk[0];
    if (!track) {
      throw new ImportError('GPX file has no trk element');
    }
    const segment = track.trkseg[0];
    if (!segment) {
      throw new ImportError('GPX track has no trkseg element');
    }
    if (segment.trkpt.length === 0) {
      throw new ImportError('GPX track segment is empty');
    }

    let previousAltitude = 0;
    return segment.trkpt.map((trkpt) => {
      const altitude = trkpt.ele ?? previousAltitude;
      previousAltitude = altitude;
      return { latitude: trkpt['@_lat'], longitude: trkpt['@_lon'], altitude };
    });
  }
}
