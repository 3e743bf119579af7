import { FlightRules } from '../../types/metar.types';
import type { CloudLayer } from '../../types/metar.types';
import {
  classifyFlightRules,
  getCeiling,
  getFlightRules,
  visibilityInMiles,
} from '../flightRules';

describe('flightRules', () => {
  describe('classifyFlightRules', () => {
    it('reports IFR when visibility is unknown, whatever the ceiling', () => {
      expect(classifyFlightRules(undefined)).toBe(FlightRules.IFR);
      expect(classifyFlightRules(undefined, 2)).toBe(FlightRules.IFR);
      expect(classifyFlightRules(undefined, 250)).toBe(FlightRules.IFR);
    });

    it('classifies by ceiling when visibility is good', () => {
      expect(classifyFlightRules(10, 10)).toBe(FlightRules.MVFR);
      expect(classifyFlightRules(10, 9)).toBe(FlightRules.IFR);
      expect(classifyFlightRules(10, 4)).toBe(FlightRules.LIFR);
      expect(classifyFlightRules(10)).toBe(FlightRules.VFR);
    });

    it('classifies by visibility when there is no ceiling', () => {
      expect(classifyFlightRules(4, 99)).toBe(FlightRules.MVFR);
      expect(classifyFlightRules(2, 99)).toBe(FlightRules.IFR);
      expect(classifyFlightRules(0.75, 99)).toBe(FlightRules.LIFR);
    });

    it('uses the worse of the two', () => {
      expect(classifyFlightRules(0.75, 8)).toBe(FlightRules.LIFR);
      expect(classifyFlightRules(2, 25)).toBe(FlightRules.IFR);
    });

    it('compares thresholds strictly', () => {
      expect(classifyFlightRules(5, 30)).toBe(FlightRules.VFR);
      expect(classifyFlightRules(3, 10)).toBe(FlightRules.MVFR);
      expect(classifyFlightRules(1, 5)).toBe(FlightRules.IFR);
    });

    it('treats CAVOK as VFR', () => {
      expect(classifyFlightRules(9999 * 0.000621371, 99)).toBe(FlightRules.VFR);
    });
  });

  describe('visibilityInMiles', () => {
    it('passes statute miles through and converts meters', () => {
      expect(visibilityInMiles({ value: 2.5, unit: 'SM', repr: '5/2', cavok: false })).toBe(2.5);
      expect(visibilityInMiles({ value: 1000, unit: 'm', repr: '1000', cavok: false })).toBeCloseTo(0.621371, 6);
      expect(visibilityInMiles({ value: 9999, unit: 'm', repr: 'CAVOK', cavok: true })).toBeCloseTo(6.213, 3);
      expect(visibilityInMiles(undefined)).toBeUndefined();
    });
  });

  describe('getCeiling', () => {
    const few: CloudLayer = { type: 'FEW', height: 20, repr: 'FEW020' };
    const brokenUnknown: CloudLayer = { type: 'BKN', height: null, repr: 'BKN///' };
    const overcast: CloudLayer = { type: 'OVC', height: 15, repr: 'OVC015' };
    const vertical: CloudLayer = { type: 'VV', height: 2, repr: 'VV002' };

    it('returns the lowest broken, overcast or obscured layer with a height', () => {
      expect(getCeiling([few, brokenUnknown, overcast])).toBe(overcast);
      expect(getCeiling([vertical])).toBe(vertical);
    });

    it('returns undefined when nothing qualifies', () => {
      expect(getCeiling([few, { type: 'SCT', height: 40, repr: 'SCT040' }])).toBeUndefined();
      expect(getCeiling([])).toBeUndefined();
    });
  });

  describe('getFlightRules', () => {
    it('combines visibility and the ceiling layer', () => {
      expect(getFlightRules({
        visibility: { value: 10, unit: 'SM', repr: '10', cavok: false },
        clouds: [{ type: 'OVC', height: 10, repr: 'OVC010' }],
      })).toBe(FlightRules.MVFR);
    });

    it('defaults to IFR with no visibility', () => {
      expect(getFlightRules({ visibility: undefined, clouds: [] })).toBe(FlightRules.IFR);
    });
  });
});
