import { expect } from 'chai'

import { formatCount, formatDuration, formatMegabytes, formatRate, formatTimestamp } from '../../src/utils/formatting.js'

describe('formatting', () => {
  it('formats megabytes with two decimals', () => {
    expect(formatMegabytes(0)).to.equal('0.00')
    expect(formatMegabytes(1024 * 1024 * 1.5)).to.equal('1.50')
  })

  it('groups thousands in counts', () => {
    expect(formatCount(1_234_567)).to.equal('1,234,567')
  })

  it('formats durations in seconds', () => {
    expect(formatDuration(1500)).to.equal('1.5s')
    expect(formatDuration(0)).to.equal('0.0s')
  })

  it('computes a rounded rate per second', () => {
    expect(formatRate(500, 2000)).to.equal('250')
    expect(formatRate(3_000_000, 1000)).to.equal('3,000,000')
    expect(formatRate(5, 0)).to.equal('0')
  })

  it('formats timestamps in local time', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9))).to.equal('2024-01-05 07:08:09')
  })
})
