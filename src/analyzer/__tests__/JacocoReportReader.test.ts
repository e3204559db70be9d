import { JacocoReportReader, descriptorToParams } from '../JacocoReportReader';
import * as fileUtils from '../../utils/fileUtils';

jest.mock('../../utils/fileUtils');
jest.mock('../../utils/logger');

const REPORT_XML = `<?xml version="1.0" encoding="UTF-8"?>
<report name="demo">
  <package name="com/example">
    <class name="com/example/Calc" sourcefilename="Calc.java">
      <method name="&lt;init&gt;" desc="()V" line="3">
        <counter type="LINE" missed="0" covered="1"/>
      </method>
      <method name="calc" desc="(II)I" line="5">
        <counter type="INSTRUCTION" missed="10" covered="0"/>
        <counter type="LINE" missed="4" covered="0"/>
        <counter type="BRANCH" missed="2" covered="0"/>
      </method>
      <method name="sum" desc="(Ljava/util/List;[D)D" line="12">
        <counter type="LINE" missed="1" covered="3"/>
        <counter type="SOMETHING_NEW" missed="1" covered="1"/>
      </method>
      <counter type="LINE" missed="5" covered="4"/>
      <counter type="BRANCH" missed="2" covered="0"/>
    </class>
  </package>
</report>`;

describe('JacocoReportReader', () => {
    const mockedFileExists = jest.mocked(fileUtils.fileExists);
    const mockedReadFile = jest.mocked(fileUtils.readFile);
    const mockedFindFiles = jest.mocked(fileUtils.findFiles);
    let reader: JacocoReportReader;

    beforeEach(() => {
        jest.clearAllMocks();
        reader = new JacocoReportReader();
    });

    describe('descriptorToParams', () => {
        it('should translate primitive, object and array descriptors', () => {
            expect(descriptorToParams('(ILjava/util/List;[D)V')).toEqual(['int', 'List', 'double[]']);
        });

        it('should return no params for an empty descriptor', () => {
            expect(descriptorToParams('()V')).toEqual([]);
            expect(descriptorToParams('garbage')).toEqual([]);
        });

        it('should keep nested array dimensions', () => {
            expect(descriptorToParams('([[Ljava/lang/String;Z)V')).toEqual(['String[][]', 'boolean']);
        });
    });

    describe('parseReport', () => {
        it('should extract methods and class counters for a dotted class name', async () => {
            const report = await reader.parseReport(REPORT_XML, 'com.example.Calc');

            expect(report).not.toBeNull();
            expect(report?.className).toBe('com.example.Calc');
            expect(report?.sourceFile).toBe('Calc.java');
            expect(report?.methods).toEqual([
                { name: '<init>', params: [], line: 3, counters: [{ type: 'LINE', missed: 0, covered: 1 }] },
                {
                    name: 'calc',
                    params: ['int', 'int'],
                    line: 5,
                    counters: [
                        { type: 'INSTRUCTION', missed: 10, covered: 0 },
                        { type: 'LINE', missed: 4, covered: 0 },
                        { type: 'BRANCH', missed: 2, covered: 0 },
                    ],
                },
                { name: 'sum', params: ['List', 'double[]'], line: 12, counters: [{ type: 'LINE', missed: 1, covered: 3 }] },
            ]);
            expect(report?.counters).toEqual([
                { type: 'LINE', missed: 5, covered: 4 },
                { type: 'BRANCH', missed: 2, covered: 0 },
            ]);
        });

        it('should match a bare class name on the simple name', async () => {
            const report = await reader.parseReport(REPORT_XML, 'Calc');
            expect(report?.className).toBe('com.example.Calc');
        });

        it('should return null when the class is not in the report', async () => {
            await expect(reader.parseReport(REPORT_XML, 'com.other.Calc')).resolves.toBeNull();
        });

        it('should reject documents without a report root', async () => {
            await expect(reader.parseReport('<coverage/>', 'Calc')).rejects.toThrow('Not a JaCoCo report');
        });
    });

    describe('getClassCoverage', () => {
        it('should read the report at the configured path', async () => {
            mockedFileExists.mockResolvedValue(true);
            mockedReadFile.mockResolvedValue(REPORT_XML);

            const lookup = await reader.getClassCoverage('/proj', 'com.example.Calc');

            expect(mockedReadFile).toHaveBeenCalledWith('/proj/target/site/jacoco/jacoco.xml');
            expect(lookup.ok).toBe(true);
            if (lookup.ok) {
                expect(lookup.reportPath).toBe('/proj/target/site/jacoco/jacoco.xml');
                expect(lookup.report.methods).toHaveLength(3);
            }
        });

        it('should search for a report when the configured path is missing', async () => {
            mockedFileExists.mockResolvedValue(false);
            mockedFindFiles.mockResolvedValue(['/proj/module/target/jacoco-ut.xml']);
            mockedReadFile.mockResolvedValue(REPORT_XML);

            const lookup = await reader.getClassCoverage('/proj', 'com.example.Calc');

            expect(mockedFindFiles).toHaveBeenCalledWith('/proj', '**/jacoco*.xml', { ignore: ['**/node_modules/**'] });
            expect(lookup).toEqual(expect.objectContaining({ ok: true, reportPath: '/proj/module/target/jacoco-ut.xml' }));
        });

        it('should report a missing report as an error result', async () => {
            mockedFileExists.mockResolvedValue(false);
            mockedFindFiles.mockResolvedValue([]);

            await expect(reader.getClassCoverage('/proj', 'com.example.Calc')).resolves.toEqual({
                ok: false,
                error: 'ERROR: No coverage report found under /proj',
            });
        });

        it('should report a class missing from the report', async () => {
            mockedFileExists.mockResolvedValue(true);
            mockedReadFile.mockResolvedValue(REPORT_XML);

            await expect(reader.getClassCoverage('/proj', 'com.example.Missing')).resolves.toEqual({
                ok: false,
                error: 'ERROR: Class com.example.Missing not found in /proj/target/site/jacoco/jacoco.xml',
            });
        });

        it('should turn read failures into an error result', async () => {
            mockedFileExists.mockResolvedValue(true);
            mockedReadFile.mockRejectedValue(new Error('EACCES'));

            await expect(reader.getClassCoverage('/proj', 'com.example.Calc')).resolves.toEqual({
                ok: false,
                error: 'ERROR: Unreadable coverage report /proj/target/site/jacoco/jacoco.xml: EACCES',
            });
        });
    });
});
