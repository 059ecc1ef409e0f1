import * as core from '@actions/core'

import { formatComplex, run } from '../src/main'
import { writeSummary } from '../src/summary'

import fs from 'fs'
import os from 'os'
import path from 'path'

// Mock the GitHub Actions core library
let errorMock: jest.SpyInstance
let warningMock: jest.SpyInstance
let getInputMock: jest.SpyInstance
let getBooleanInputMock: jest.SpyInstance
let setFailedMock: jest.SpyInstance
let setOutputMock: jest.SpyInstance
let startGroupMock: jest.SpyInstance
let endGroupMock: jest.SpyInstance

const defaultValues: Record<string, string> = {
    base: '10',
    'memory-magnitude': 'MB',
    'range-policy': 'split',
    strict: 'false'
}

const allInputs: Record<string, string> = {
    ...defaultValues,
    unsigned: '42',
    uintmax: '18446744073709551615',
    double: '2.5',
    'complex-part': '-3i',
    complex: '3-4i',
    memory: '2GB'
}

// The summary writer keeps the first file path it sees, so the whole suite shares one file
const tmpSummaryFile = path.join(os.tmpdir(), `gh-summary-${Date.now()}`)

function readSummary(): string {
    return fs.readFileSync(tmpSummaryFile, 'utf8')
}

function summaryOf(items: string[]): string {
    return `<h2>Numeric Input Parsing Summary</h2>${os.EOL}<ul>${items.map(item => `<li>${item}</li>`).join('')}</ul>${os.EOL}`
}

beforeAll(() => {
    process.env.GITHUB_STEP_SUMMARY = tmpSummaryFile
})

afterAll(() => {
    if (fs.existsSync(tmpSummaryFile)) {
        fs.unlinkSync(tmpSummaryFile)
    }
    delete process.env.GITHUB_STEP_SUMMARY
})

beforeEach(() => {
    fs.writeFileSync(tmpSummaryFile, '', { flag: 'w' }) // Ensure file exists and is empty
    jest.clearAllMocks()

    errorMock = jest.spyOn(core, 'error').mockImplementation()
    warningMock = jest.spyOn(core, 'warning').mockImplementation()
    jest.spyOn(core, 'info').mockImplementation()
    jest.spyOn(core, 'debug').mockImplementation()
    startGroupMock = jest.spyOn(core, 'startGroup').mockImplementation()
    endGroupMock = jest.spyOn(core, 'endGroup').mockImplementation()
    getInputMock = jest.spyOn(core, 'getInput').mockImplementation()
    getBooleanInputMock = jest.spyOn(core, 'getBooleanInput').mockImplementation()
    setFailedMock = jest.spyOn(core, 'setFailed').mockImplementation()
    setOutputMock = jest.spyOn(core, 'setOutput').mockImplementation()
})

afterEach(() => {
    jest.restoreAllMocks()
})

describe('action', () => {
    it('should parse all inputs', async () => {
        setupMockInputs(allInputs)

        await run()

        expect(setOutputMock.mock.calls).toEqual([
            ['unsigned', '42'],
            ['uintmax', '18446744073709551615'],
            ['double', '2.5'],
            ['complex-part', '-3i'],
            ['complex-part-kind', 'imaginary'],
            ['complex', '3 - 4i'],
            ['memory', '2000000000']
        ])
        expect(warningMock).not.toHaveBeenCalled()
        expect(setFailedMock).not.toHaveBeenCalled()
        expect(startGroupMock).toHaveBeenCalledWith('Parse numeric inputs')
        expect(endGroupMock).toHaveBeenCalledTimes(1)
        expect(readSummary()).toEqual(
            summaryOf([
                'unsigned: 42',
                'uintmax: 18446744073709551615',
                'double: 2.5',
                'complex-part: -3i',
                'complex: 3 - 4i',
                'memory: 2000000000',
                '✅ Success'
            ])
        )
    })

    it('should run without value inputs', async () => {
        setupMockInputs(defaultValues)

        await run()

        expect(setOutputMock).not.toHaveBeenCalled()
        expect(setFailedMock).not.toHaveBeenCalled()
        expect(readSummary()).toEqual(summaryOf(['✅ Success']))
    })

    it('should warn about text left after a value', async () => {
        setupMockInputs({ ...defaultValues, double: '2.5kg' })

        await run()

        expect(setOutputMock).toHaveBeenCalledWith('double', '2.5')
        expect(warningMock).toHaveBeenCalledWith('double: WARNING: Argument not fully parsed')
        expect(setFailedMock).not.toHaveBeenCalled()
        expect(readSummary()).toEqual(summaryOf(['double: 2.5 (not fully parsed)', '✅ Success']))
    })

    it('should fail on text left after a value in strict mode', async () => {
        setupMockInputs({ ...defaultValues, strict: 'true', double: '2.5kg' })

        await run()

        expect(setOutputMock).not.toHaveBeenCalled()
        expect(errorMock).toHaveBeenCalledWith('double: Argument not fully parsed\ninput: "2.5kg"\ncursor: 3')
        expect(setFailedMock).toHaveBeenCalledWith(
            expect.objectContaining({ message: 'double: Argument not fully parsed' })
        )
        expect(readSummary()).toEqual(summaryOf(['❌ Error: double: Argument not fully parsed']))
    })

    it('should fail on an out of range value', async () => {
        setupMockInputs({ ...defaultValues, unsigned: '100000000000000000000' })

        await run()

        expect(errorMock).toHaveBeenCalledWith(
            'unsigned: Argument out of range\ninput: "100000000000000000000"\ncursor: 21'
        )
        expect(setFailedMock).toHaveBeenCalledWith(
            expect.objectContaining({ message: 'unsigned: Argument out of range' })
        )
    })

    it('should stop at the first input that fails', async () => {
        setupMockInputs({ ...defaultValues, unsigned: '7', double: 'abc', memory: '1kB' })

        await run()

        expect(setOutputMock.mock.calls).toEqual([['unsigned', '7']])
        expect(setFailedMock).toHaveBeenCalledWith(expect.objectContaining({ message: 'double: Unknown parse error' }))
        expect(endGroupMock).toHaveBeenCalledTimes(1)
        expect(readSummary()).toEqual(summaryOf(['unsigned: 7', '❌ Error: double: Unknown parse error']))
    })

    it('should parse integers in the given base', async () => {
        setupMockInputs({ ...defaultValues, base: '16', unsigned: 'ff', uintmax: '0x10' })

        await run()

        expect(setOutputMock).toHaveBeenCalledWith('unsigned', '255')
        expect(setOutputMock).toHaveBeenCalledWith('uintmax', '16')
        expect(setFailedMock).not.toHaveBeenCalled()
    })

    it('should fail on a base above 36', async () => {
        setupMockInputs({ ...defaultValues, base: '40', unsigned: '1' })

        await run()

        expect(errorMock).toHaveBeenCalledWith('base: Argument too large\ninput: "40"\ncursor: 2')
        expect(setFailedMock).toHaveBeenCalledWith(expect.objectContaining({ message: 'base: Argument too large' }))
        expect(setOutputMock).not.toHaveBeenCalled()
    })

    it('should fail on an invalid conversion radix', async () => {
        setupMockInputs({ ...defaultValues, base: '1', unsigned: '5' })

        await run()

        expect(setFailedMock).toHaveBeenCalledWith(
            expect.objectContaining({ message: 'unsigned: Invalid conversion radix' })
        )
    })

    it('should fail on a malformed complex term', async () => {
        setupMockInputs({ ...defaultValues, 'complex-part': '+-3' })

        await run()

        expect(setOutputMock).not.toHaveBeenCalled()
        expect(setFailedMock).toHaveBeenCalledWith(
            expect.objectContaining({ message: 'complex-part: Incorrect argument format' })
        )
    })

    it('should publish the kind of a real complex term', async () => {
        setupMockInputs({ ...defaultValues, 'complex-part': '4.5' })

        await run()

        expect(setOutputMock.mock.calls).toEqual([
            ['complex-part', '4.5'],
            ['complex-part-kind', 'real']
        ])
    })

    it('should keep the first term of an incomplete complex number', async () => {
        setupMockInputs({ ...defaultValues, complex: '3+4' })

        await run()

        expect(setOutputMock).toHaveBeenCalledWith('complex', '3 + 0i')
        expect(warningMock).toHaveBeenCalledWith('complex: WARNING: Argument not fully parsed')
        expect(setFailedMock).not.toHaveBeenCalled()
    })

    it('should take memory without a unit in the given magnitude', async () => {
        setupMockInputs({ ...defaultValues, 'memory-magnitude': 'kB', memory: '64' })

        await run()

        expect(setOutputMock).toHaveBeenCalledWith('memory', '64000')
    })

    it('should default the memory magnitude to megabytes', async () => {
        setupMockInputs({ memory: '3' })

        await run()

        expect(setOutputMock).toHaveBeenCalledWith('memory', '3000000')
    })

    it.each([
        { name: 'memory-magnitude', value: 'XB', message: 'Memory magnitude has unknown value' },
        { name: 'range-policy', value: 'bogus', message: 'Range policy has unknown value' }
    ])('should fail on an unknown $name', async ({ name, value, message }) => {
        setupMockInputs({ ...defaultValues, [name]: value, unsigned: '1' })

        await run()

        expect(errorMock).not.toHaveBeenCalled()
        expect(setOutputMock).not.toHaveBeenCalled()
        expect(setFailedMock).toHaveBeenCalledWith(expect.objectContaining({ message }))
        expect(readSummary()).toEqual(summaryOf([`❌ Error: ${message}`]))
    })
})

describe('formatComplex', () => {
    it('should write the sign of the imaginary part between the terms', () => {
        expect(formatComplex({ re: 3, im: -4 })).toEqual('3 - 4i')
        expect(formatComplex({ re: -1.5, im: 0 })).toEqual('-1.5 + 0i')
    })
})

describe('writeSummary', () => {
    it('writes parsed values and flags partial ones', async () => {
        await writeSummary({
            parsed: [
                { input: 'memory', text: '2GB', output: '2000000000', status: 'SUCCESS' },
                { input: 'double', text: '1x', output: '1', status: 'EEND' }
            ]
        })
        expect(readSummary()).toEqual(
            summaryOf(['memory: 2000000000', 'double: 1 (not fully parsed)', '✅ Success'])
        )
    })
    it('writes error if present', async () => {
        await writeSummary({ parsed: [], errorMessage: 'fail' })
        expect(readSummary()).toEqual(summaryOf(['❌ Error: fail']))
    })
})

function setupMockInputs(inputs: Record<string, string>) {
    getInputMock.mockImplementation((name: string) => {
        return inputs[name] || ''
    })
    getBooleanInputMock.mockImplementation((name: string) => {
        return inputs[name] === 'true'
    })
}
