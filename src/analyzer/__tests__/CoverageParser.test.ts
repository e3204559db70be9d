import { CoverageParser, counterPercent, derivePriority } from '../CoverageParser';
import { ClassCoverageReport } from '../../models/CoverageModels';

function calcReport(): ClassCoverageReport {
    return {
        className: 'com.example.Calc',
        sourceFile: 'Calc.java',
        methods: [
            { name: '<init>', params: [], counters: [{ type: 'LINE', covered: 1, missed: 0 }] },
            {
                name: 'calc',
                params: ['int', 'int'],
                line: 12,
                counters: [
                    { type: 'LINE', covered: 0, missed: 4 },
                    { type: 'BRANCH', covered: 0, missed: 2 },
                ],
            },
            { name: 'getX', params: [], counters: [{ type: 'LINE', covered: 2, missed: 0 }] },
            { name: 'lambda$run$0', params: [], counters: [{ type: 'LINE', covered: 0, missed: 1 }] },
            {
                name: 'half',
                params: [],
                counters: [
                    { type: 'LINE', covered: 1, missed: 2 },
                    { type: 'BRANCH', covered: 1, missed: 1 },
                ],
            },
        ],
        counters: [
            { type: 'LINE', covered: 4, missed: 6 },
            { type: 'BRANCH', covered: 1, missed: 3 },
        ],
    };
}

describe('CoverageParser', () => {
    const parser = new CoverageParser(80);

    describe('counterPercent', () => {
        it('should treat a missing counter as fully covered', () => {
            expect(counterPercent(undefined)).toBe(100);
        });

        it('should treat a counter with nothing to cover as fully covered', () => {
            expect(counterPercent({ type: 'LINE', covered: 0, missed: 0 })).toBe(100);
        });

        it('should round to one decimal', () => {
            expect(counterPercent({ type: 'LINE', covered: 1, missed: 2 })).toBe(33.3);
        });
    });

    describe('derivePriority', () => {
        it('should map zero coverage to P0, partial to P1 and covered to P2', () => {
            expect(derivePriority(0, 80)).toBe('P0');
            expect(derivePriority(50, 80)).toBe('P1');
            expect(derivePriority(80, 80)).toBe('P2');
        });
    });

    describe('parseStructured', () => {
        it('should skip constructors and synthetic methods', () => {
            const methods = parser.parseStructured(calcReport());

            expect(methods.map(m => m.signature)).toEqual(['calc(int, int)', 'getX()', 'half()']);
        });

        it('should derive coverage and priority per method', () => {
            const [calc, getX, half] = parser.parseStructured(calcReport());

            expect(calc).toEqual({ name: 'calc', signature: 'calc(int, int)', priority: 'P0', lineCoverage: 0, branchCoverage: 0 });
            expect(getX).toEqual({ name: 'getX', signature: 'getX()', priority: 'P2', lineCoverage: 100, branchCoverage: 100 });
            expect(half).toEqual({ name: 'half', signature: 'half()', priority: 'P1', lineCoverage: 33.3, branchCoverage: 50 });
        });

        it('should count a method without executable lines as covered', () => {
            const report: ClassCoverageReport = {
                className: 'Empty',
                methods: [{ name: 'noop', params: [], counters: [{ type: 'LINE', covered: 0, missed: 0 }] }],
                counters: [],
            };

            expect(parser.parseStructured(report)).toEqual([
                { name: 'noop', signature: 'noop()', priority: 'P2', lineCoverage: 100, branchCoverage: 100 },
            ]);
        });

        it('should return frozen records', () => {
            const [calc] = parser.parseStructured(calcReport());
            expect(Object.isFrozen(calc)).toBe(true);
        });
    });

    describe('renderSummary', () => {
        it('should render one line per method with status glyphs and a class total', () => {
            expect(parser.renderSummary(calcReport())).toBe([
                'Method coverage for com.example.Calc:',
                '✓ constructor() Line: 100.0% Branch: 100.0%',
                '✗ calc(int, int) Line: 0.0% Branch: 0.0%',
                '✓ getX() Line: 100.0% Branch: 100.0%',
                '◐ half() Line: 33.3% Branch: 50.0%',
                'Class total: Line: 40.0% Branch: 25.0%',
            ].join('\n'));
        });
    });

    describe('parseRendered', () => {
        it('should yield the same records as the structured path for the same data', () => {
            const report = calcReport();

            expect(parser.parseRendered(parser.renderSummary(report))).toEqual(parser.parseStructured(report));
        });

        it('should ignore lines that are not method lines', () => {
            const text = 'Some header\n◐ add(int, int) Line: 50.0% Branch: 25.0%\nnothing here';

            expect(parser.parseRendered(text)).toEqual([
                { name: 'add', signature: 'add(int, int)', priority: 'P1', lineCoverage: 50, branchCoverage: 25 },
            ]);
        });
    });

    describe('parse', () => {
        it('should dispatch on the source kind', () => {
            const structured = parser.parse({ kind: 'structured', report: calcReport() });
            const rendered = parser.parse({ kind: 'rendered', text: '✗ calc(int, int) Line: 0.0% Branch: 0.0%' });

            expect(structured).toHaveLength(3);
            expect(rendered).toEqual([structured[0]]);
        });
    });

    describe('classLineCoverage', () => {
        it('should read the class LINE counter', () => {
            expect(parser.classLineCoverage(calcReport())).toBe(40);
        });
    });
});
