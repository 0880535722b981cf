import { expect } from 'chai'
import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'

import { buildReportRows, renderReport, scanPartitions, writeReport } from '../../src/report/report.js'
import { makeTempDir } from '../helpers.js'

describe('report', () => {
  describe('buildReportRows', () => {
    it('reports countries known to only one side with zeros for the other', () => {
      const disk = new Map([
        ['NO', { files: 1, sizeBytes: 2048 }],
        ['SE', { files: 2, sizeBytes: 1_048_576 }],
      ])
      expect(buildReportRows({ BE: 2, NO: 5 }, disk)).to.deep.equal([
        { country: 'BE', files: 0, records: 2, sizeBytes: 0 },
        { country: 'NO', files: 1, records: 5, sizeBytes: 2048 },
        { country: 'SE', files: 2, records: 0, sizeBytes: 1_048_576 },
      ])
    })
  })

  describe('renderReport', () => {
    it('renders a markdown table with a totals row', () => {
      const rows = [
        { country: 'BE', files: 0, records: 2, sizeBytes: 0 },
        { country: 'NO', files: 1, records: 5, sizeBytes: 2048 },
        { country: 'SE', files: 2, records: 0, sizeBytes: 1_048_576 },
      ]
      expect(renderReport(rows, new Date(2024, 0, 2, 3, 4, 5))).to.equal(
        [
          '# PEPPOL Sync Report',
          '',
          'Generated on: 2024-01-02 03:04:05',
          '',
          '| Country | Files | Records | Size (MB) |',
          '|---|---:|---:|---:|',
          '| BE | 0 | 2 | 0.00 |',
          '| NO | 1 | 5 | 0.00 |',
          '| SE | 2 | 0 | 1.00 |',
          '| **Total** | **3** | **7** | **1.00** |',
          '',
        ].join('\n'),
      )
    })

    it('renders only the totals row when nothing was processed', () => {
      const report = renderReport([], new Date(2024, 0, 2, 3, 4, 5))
      expect(report.endsWith('|---|---:|---:|---:|\n| **Total** | **0** | **0** | **0.00** |\n')).to.equal(true)
    })
  })

  describe('on disk', () => {
    let temp: ReturnType<typeof makeTempDir>

    beforeEach(() => {
      temp = makeTempDir()
      mkdirSync(join(temp.path, 'NO'))
      writeFileSync(join(temp.path, 'NO', 'business-cards.000001.xml'), 'a'.repeat(100))
      writeFileSync(join(temp.path, 'NO', 'business-cards.000002.xml'), 'b'.repeat(50))
      writeFileSync(join(temp.path, 'NO', 'business-cards.000003.xml.partial'), 'c'.repeat(10))
      mkdirSync(join(temp.path, 'FR'))
      writeFileSync(join(temp.path, 'FR', 'business-cards.000001.xml'), 'd'.repeat(30))
      writeFileSync(join(temp.path, 'peppol_sync.log'), '{}\n')
    })

    afterEach(() => {
      temp.remove()
    })

    it('counts finished shards per country directory', () => {
      expect(scanPartitions(temp.path)).to.deep.equal(
        new Map([
          ['FR', { files: 1, sizeBytes: 30 }],
          ['NO', { files: 2, sizeBytes: 150 }],
        ]),
      )
    })

    it('writes report.md next to the country directories', () => {
      const reportPath = writeReport(temp.path, { BE: 1, NO: 3 }, new Date(2024, 0, 2, 3, 4, 5))
      expect(reportPath).to.equal(join(temp.path, 'report.md'))

      const lines = readFileSync(reportPath, 'utf8').split('\n')
      expect(lines.slice(6)).to.deep.equal([
        '| BE | 0 | 1 | 0.00 |',
        '| FR | 1 | 0 | 0.00 |',
        '| NO | 2 | 3 | 0.00 |',
        '| **Total** | **3** | **4** | **0.00** |',
        '',
      ])
    })
  })
})
