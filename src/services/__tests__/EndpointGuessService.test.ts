import { ZodError } from 'zod';
import EndpointGuessService from '../EndpointGuessService';
import Gazetteer from '../Gazetteer';
import logger from '../../utils/logger';
import {
  RJAA, RJCC, RJTT, buildSample,
} from '../../__tests__/fixtures/trackFixtures';
import type { PositionSample, TrackBatch } from '../../types/trajectory.types';

jest.mock('../../utils/logger', () => ({
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  info: jest.fn(),
}));

const jal001Morning: PositionSample[] = [
  buildSample({ timestamp: 0, latitudeDeg: 35.7, longitudeDeg: 139.77, altitudeFt: 500 }),
  buildSample({ timestamp: 300, latitudeDeg: 35.85, longitudeDeg: 139.9, altitudeFt: 12000 }),
  buildSample({ timestamp: 600, latitudeDeg: 36, longitudeDeg: 140, altitudeFt: 30000 }),
];

const sky003: PositionSample[] = [
  buildSample({
    callsign: 'SKY003', timestamp: 0, latitudeDeg: 36.01, longitudeDeg: 140.01, altitudeFt: 30000, category: 'B737',
  }),
  buildSample({
    callsign: 'SKY003', timestamp: 1200, latitudeDeg: 35.01, longitudeDeg: 140.99, altitudeFt: 31000, category: 'B737',
  }),
];

const undated = (samples: PositionSample[]): TrackBatch => ({ dateMode: 'WithoutDate', samples });

const dated = (date: string, samples: PositionSample[]): TrackBatch => ({
  dateMode: 'WithDate',
  samples: samples.map((sample) => ({ ...sample, date })),
});

const fixes = () => Gazetteer.load([
  { name: 'ADDUM', latDms: '350000N', lonDms: '1410000E' },
  { name: 'BOSCO', latDms: '360000N', lonDms: '1400000E' },
], 'fix');

describe('EndpointGuessService', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('constructor', () => {
    it('should apply default options', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });
      expect(service.getOptions()).toEqual({
        altitudeThresholdFt: 6000,
        radiusKm: 10,
        includeFixes: false,
      });
    });

    it('should reject a non-positive radius', () => {
      expect(() => new EndpointGuessService(
        { airports: Gazetteer.load([RJTT], 'airport') },
        { radiusKm: 0 },
      )).toThrow(ZodError);
    });
  });

  describe('run', () => {
    it('should assign the departure airport of a climbing flight', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });

      const report = service.run(undated(jal001Morning));

      expect(report.dateMode).toBe('WithoutDate');
      expect(report.departed).toHaveLength(1);
      expect(report.departed[0].assignedLocation).toBe('RJTT');
      expect(report.departed[0].distanceKm).toBeGreaterThan(0);
      expect(report.landed).toEqual([]);
      expect(report.results).toHaveLength(1);
      expect(report.results[0].callsign).toBe('JAL001');
      expect(report.results[0].entryPoint).toBe('RJTT');
      expect(report.results[0].entryDistanceKm).toBeCloseTo(2.80758, 5);
      expect(report.results[0].exitPoint).toBeUndefined();
      expect(report.stats).toEqual({ airports: { considered: 1, assigned: 1, unresolved: 0 } });
      expect(report.warnings).toEqual([]);

      const [record] = service.toRecords();
      expect(record.Callsign).toBe('JAL001');
      expect(record.EntryPoint).toBe('RJTT');
      expect(record.ExitPoint).toBeNull();
      expect(record.Distance_to_ExitPoint).toBeNull();
      expect(record).not.toHaveProperty('date');
    });

    it('should restrict airports to the target list', () => {
      const service = new EndpointGuessService(
        { airports: Gazetteer.load([RJTT, RJAA, RJCC], 'airport') },
        { targetLocations: ['RJAA'] },
      );

      const report = service.run(undated(jal001Morning));

      expect(report.results[0].entryPoint).toBeUndefined();
      expect(report.stats.airports).toEqual({ considered: 1, assigned: 0, unresolved: 1 });
    });

    it('should leave flights airborne at both ends out when fixes are disabled', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport'), fixes: fixes() });

      const report = service.run(undated([...jal001Morning, ...sky003]));

      expect(report.results.map((r) => r.callsign)).toEqual(['JAL001']);
      expect(report.stats.fixes).toBeUndefined();
    });

    it('should assign fixes to flights airborne at both ends', () => {
      const service = new EndpointGuessService(
        { airports: Gazetteer.load([RJTT], 'airport'), fixes: fixes() },
        { includeFixes: true },
      );

      const report = service.run(undated([...jal001Morning, ...sky003]));
      const sky = report.results.find((r) => r.callsign === 'SKY003');

      expect(report.results.map((r) => r.callsign)).toEqual(['JAL001', 'SKY003']);
      expect(sky?.entryPoint).toBe('BOSCO');
      expect(sky?.entryDistanceKm).toBeCloseTo(1.5743, 4);
      expect(sky?.exitPoint).toBe('ADDUM');
      expect(sky?.exitDistanceKm).toBeCloseTo(1.5743, 4);
      expect(report.stats.fixes).toEqual({ considered: 2, assigned: 2, unresolved: 0 });
    });

    it('should not touch departed flights during the fix phase', () => {
      const service = new EndpointGuessService(
        { airports: Gazetteer.load([RJCC], 'airport'), fixes: fixes() },
        { includeFixes: true },
      );

      const report = service.run(undated(jal001Morning));

      expect(report.results).toHaveLength(1);
      expect(report.results[0].entryPoint).toBeUndefined();
      expect(report.results[0].exitPoint).toBeUndefined();
    });

    it('should warn and skip fixes when no fix gazetteer is supplied', () => {
      const service = new EndpointGuessService(
        { airports: Gazetteer.load([RJTT], 'airport') },
        { includeFixes: true },
      );

      const report = service.run(undated([...jal001Morning, ...sky003]));

      expect(report.results.map((r) => r.callsign)).toEqual(['JAL001']);
      expect(logger.warn).toHaveBeenCalledWith(
        'Fix assignment requested but no fix gazetteer was supplied; skipping',
      );
    });

    it('should report empty inputs as warnings with empty results', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([], 'airport') });

      const report = service.run(undated([]));

      expect(report.results).toEqual([]);
      expect(report.warnings.map((w) => [w.code, w.source])).toEqual([
        ['EMPTY_INPUT', 'trajectory'],
        ['EMPTY_INPUT', 'gazetteer'],
      ]);
    });
  });

  describe('loadSamples', () => {
    const afternoon = [
      buildSample({ timestamp: 43200, latitudeDeg: 35.76, longitudeDeg: 140.3, altitudeFt: 3000 }),
      buildSample({ timestamp: 45600, latitudeDeg: 35.77, longitudeDeg: 140.39, altitudeFt: 1000 }),
    ];

    it('should join consecutive dated files into one flight', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT, RJAA, RJCC], 'airport') });

      service.loadSamples(dated('20190816', jal001Morning));
      service.loadSamples(dated('20190816', afternoon));
      const report = service.assign();

      expect(report.dateMode).toBe('WithDate');
      expect(report.results).toHaveLength(1);
      expect(report.results[0].date).toBe('20190816');
      expect(report.results[0].entryPoint).toBe('RJTT');
      expect(report.results[0].exitPoint).toBe('RJAA');
      expect(report.results[0].exitDistanceKm).toBeCloseTo(0.76334, 5);
      expect(Object.keys(service.toRecords()[0])[1]).toBe('date');
    });

    it('should fall back to undated grouping when any batch lacks dates', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });

      service.loadSamples(dated('20190816', jal001Morning));
      service.loadSamples(undated(afternoon));

      expect(service.getBatch().dateMode).toBe('WithoutDate');
      expect(service.getBatch().samples).toHaveLength(5);
    });

    it('should discard a previous report', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });
      service.run(undated(jal001Morning));

      service.loadSamples(undated(sky003));

      expect(service.getReport()).toBeNull();
      expect(service.getResults()).toEqual([]);
    });
  });

  describe('getResults', () => {
    it('should be empty before assignment', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });
      service.loadSamples(undated(jal001Morning));
      service.preprocess();

      expect(service.getResults()).toEqual([]);
    });
  });

  describe('annotateSamples', () => {
    it('should attach flight results to every loaded sample', () => {
      const service = new EndpointGuessService({ airports: Gazetteer.load([RJTT], 'airport') });
      service.run(undated(jal001Morning));

      const records = service.annotateSamples();

      expect(records).toHaveLength(3);
      expect(records.every((r) => r.EntryPoint === 'RJTT')).toBe(true);
      expect(records[2].Altitude).toBe(30000);
    });
  });
});
