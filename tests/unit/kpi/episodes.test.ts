import { describe, it, expect } from 'vitest';
import {
    aggregateDeviceDays,
    buildAntibioticRanking,
    buildAntibioticTherapy,
    buildDeviceUtilization,
    buildLabPanel,
    buildVentilationSummary,
    groupDeviceUse,
    summarizePatientVentilation,
} from '../../../src/kpi/episodes.js';
import type { KpiRules } from '../../../src/rules/types.js';
import type {
    AntibioticUsage,
    DeviceDayRecord,
    LabResult,
    QueryWindow,
    VentilationRecord,
} from '../../../src/kpi/types.js';

const window: QueryWindow = {
    start: new Date('2024-03-01T00:00:00Z'),
    end: new Date('2024-03-11T00:00:00Z'),
};
const now = new Date('2024-03-20T00:00:00Z');

describe('buildVentilationSummary', () => {
    const records: VentilationRecord[] = [
        {
            admissionId: 'A1',
            intubations: ['2024-03-02T12:00:00Z', '2024-03-01T06:00:00Z'],
            extubations: ['2024-03-02T00:00:00Z'],
            periods: [
                { start: '2024-03-01T06:00:00Z', end: '2024-03-02T00:00:00Z' },
                { start: '2024-03-02T12:00:00Z', end: '2024-03-03T12:00:00Z' },
            ],
        },
        {
            admissionId: 'OUTSIDE',
            intubations: ['2024-03-01T00:00:00Z'],
            extubations: [],
            periods: [{ start: '2024-03-01T00:00:00Z', end: null }],
        },
    ];

    it('should aggregate cohort members only', () => {
        const summary = buildVentilationSummary(
            records,
            [{ admissionId: 'A1', patientId: 'P1', admittedAt: '2024-03-01T00:00:00Z', outcome: 'unknown' }],
            new Set(['A1']),
            window,
            now,
            48,
        );

        expect(summary.timeToFirstIntubationHours).toEqual([6]);
        // 18h + 24h
        expect(summary.ventilatedDays).toEqual([1.75]);
        expect(summary.reintubation).toEqual({ count: 1, base: 1 });
    });

    it('should skip time to intubation when the admission instant is unknown', () => {
        const summary = buildVentilationSummary(records, [], new Set(['A1']), window, now, 48);
        expect(summary.timeToFirstIntubationHours).toEqual([]);
        expect(summary.ventilatedDays).toEqual([1.75]);
    });
});

describe('summarizePatientVentilation', () => {
    it('should return an empty summary without a record', () => {
        expect(summarizePatientVentilation(null, '2024-03-01T00:00:00Z', now, 48)).toEqual({
            totalDays: 0,
            timeToFirstIntubationHours: null,
            periods: [],
            extubations: [],
            reintubated48h: false,
        });
    });

    it('should describe periods, extubations and reintubation', () => {
        const record: VentilationRecord = {
            admissionId: 'A1',
            intubations: ['2024-03-01T03:00:00Z', '2024-03-03T00:00:00Z'],
            extubations: ['2024-03-02T03:00:00Z'],
            periods: [
                { start: '2024-03-01T03:00:00Z', end: '2024-03-02T03:00:00Z', endSource: 'extubation' },
                { start: '2024-03-03T00:00:00Z', end: null },
            ],
        };

        const result = summarizePatientVentilation(record, '2024-03-01T00:00:00Z', new Date('2024-03-04T00:00:00Z'), 48);

        expect(result).toEqual({
            totalDays: 2,
            timeToFirstIntubationHours: 3,
            periods: [
                { start: '2024-03-01T03:00:00Z', end: '2024-03-02T03:00:00Z', endSource: 'extubation' },
                { start: '2024-03-03T00:00:00Z', end: null, endSource: '' },
            ],
            extubations: ['2024-03-02T03:00:00Z'],
            reintubated48h: true,
        });
    });
});

describe('device days', () => {
    function row(admissionId: string, flags: Partial<DeviceDayRecord> = {}): DeviceDayRecord {
        return {
            admissionId,
            sectorId: 'ICU-CENTRAL',
            day: '2024-03-01T00:00:00Z',
            catheter: false,
            urinaryCatheter: false,
            arterialLine: false,
            ventilated: false,
            ...flags,
        };
    }

    const aggregate = aggregateDeviceDays([
        row('A1', { ventilated: true, catheter: true }),
        row('A1', { ventilated: true }),
        row('A2', { catheter: true }),
        row('A3'),
    ]);

    it('should count patient days and device days', () => {
        expect(aggregate.patientDays).toBe(4);
        expect(aggregate.deviceDaysByType).toEqual({
            ventilated: 2,
            catheter: 2,
            urinaryCatheter: 0,
            arterialLine: 0,
        });
        expect(aggregate.admissionIds).toEqual(['A1', 'A2', 'A3']);
        expect(aggregate.admissionIdsByType.catheter).toEqual(['A1', 'A2']);
    });

    it('should derive utilization and patient fraction', () => {
        expect(buildDeviceUtilization(aggregate, 'ventilated')).toEqual({
            deviceDays: 2,
            patientDays: 4,
            utilization: 0.5,
            patients: 1,
            totalPatients: 3,
            fraction: 0.3333,
        });
    });

    it('should return zeros when there are no patient days', () => {
        expect(buildDeviceUtilization(aggregateDeviceDays([]), 'arterialLine')).toEqual({
            deviceDays: 0,
            patientDays: 0,
            utilization: 0,
            patients: 0,
            totalPatients: 0,
            fraction: 0,
        });
    });
});

describe('groupDeviceUse', () => {
    it('should group by canonical type in a fixed order', () => {
        const groups = groupDeviceUse(
            [
                { admissionId: 'A1', deviceType: 'Art.', start: '2024-03-01T00:00:00Z', end: '2024-03-01T12:00:00Z' },
                { admissionId: 'A1', deviceType: 'CVC', start: '2024-03-03T00:00:00Z', end: '2024-03-04T00:00:00Z' },
                { admissionId: 'A1', deviceType: 'catheter', start: '2024-03-01T00:00:00Z', end: '2024-03-02T00:00:00Z' },
            ],
            now,
        );

        expect(groups.map((group) => group.type)).toEqual(['catheter', 'arterial-line']);
        expect(groups[0].totalDays).toBe(2);
        expect(groups[0].periods.map((period) => period.rawType)).toEqual(['catheter', 'CVC']);
        expect(groups[1]).toEqual({
            type: 'arterial-line',
            totalDays: 0.5,
            periods: [{ start: '2024-03-01T00:00:00Z', end: '2024-03-01T12:00:00Z', endSource: '', rawType: 'Art.' }],
        });
    });
});

describe('antibiotics', () => {
    const usages: AntibioticUsage[] = [
        {
            antibioticUsageId: 'u1',
            admissionId: 'A1',
            antibioticName: 'Meropenem',
            periods: [
                { start: '2024-02-28T00:00:00Z', end: '2024-03-03T00:00:00Z' },
                { start: '2024-03-05T00:00:00Z', end: '2024-03-06T00:00:00Z' },
            ],
        },
        {
            antibioticUsageId: 'u2',
            admissionId: 'A2',
            antibioticName: 'Meropenem',
            periods: [{ start: '2024-03-01T00:00:00Z', end: '2024-03-02T00:00:00Z' }],
        },
        {
            antibioticUsageId: 'u3',
            admissionId: 'A2',
            antibioticName: 'Vancomycin',
            periods: [{ start: '2024-03-01T00:00:00Z', end: '2024-03-05T00:00:00Z' }],
        },
        {
            antibioticUsageId: 'u4',
            admissionId: 'OUTSIDE',
            antibioticName: 'Cefazolin',
            periods: [{ start: '2024-03-01T00:00:00Z', end: '2024-03-09T00:00:00Z' }],
        },
        {
            antibioticUsageId: 'u5',
            admissionId: 'A1',
            antibioticName: '  ',
            periods: [{ start: '2024-03-08T00:00:00Z', end: '2024-03-08T12:00:00Z' }],
        },
    ];

    it('should rank cohort antibiotics by days of therapy in the window', () => {
        const ranking = buildAntibioticRanking(usages, new Set(['A1', 'A2']), window, now);

        expect(ranking).toEqual([
            { name: 'Meropenem', dotDays: 4, patientsExposed: 2 },
            { name: 'Vancomycin', dotDays: 4, patientsExposed: 1 },
            { name: 'unknown', dotDays: 0.5, patientsExposed: 1 },
        ]);
    });

    it('should build per-drug totals and date timelines for a patient', () => {
        const therapy = buildAntibioticTherapy(usages.filter((usage) => usage.admissionId === 'A2'), now);

        expect(therapy).toEqual({
            dotByDrug: [
                { name: 'Meropenem', dotDays: 1 },
                { name: 'Vancomycin', dotDays: 4 },
            ],
            timelines: [
                { name: 'Meropenem', periods: [{ start: '2024-03-01', end: '2024-03-02' }] },
                { name: 'Vancomycin', periods: [{ start: '2024-03-01', end: '2024-03-05' }] },
            ],
        });
    });
});

describe('buildLabPanel', () => {
    const rules: KpiRules = {
        readmission: { window_hours: 48 },
        reintubation: { window_hours: 48 },
        labs: {
            tracked_tests: ['creatinine', 'lactate'],
            reference_ranges: { creatinine: { high_threshold: 1.2 } },
        },
    };

    it('should keep tracked tests with a time series and flag the latest value', () => {
        const results: LabResult[] = [
            { admissionId: 'A1', test: 'Creatinine', value: 1.9, unit: 'mg/dL', takenAt: '2024-03-02T00:00:00Z' },
            { admissionId: 'A1', test: 'creatinine', value: 1.0, unit: 'mg/dL', takenAt: '2024-03-01T00:00:00Z' },
            { admissionId: 'A1', test: 'sodium', value: 140, takenAt: '2024-03-01T00:00:00Z' },
            { admissionId: 'A1', test: 'lactate', value: 1.1, takenAt: '2024-03-01T00:00:00' },
        ];

        expect(buildLabPanel(results, rules)).toEqual({
            latestByTest: {
                creatinine: { value: 1.9, unit: 'mg/dL', flag: '↑', takenAt: '2024-03-02T00:00:00Z' },
            },
            seriesByTest: {
                creatinine: [
                    { takenAt: '2024-03-01T00:00:00Z', value: 1.0 },
                    { takenAt: '2024-03-02T00:00:00Z', value: 1.9 },
                ],
            },
        });
    });
});
