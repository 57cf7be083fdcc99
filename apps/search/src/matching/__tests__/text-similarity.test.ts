import { describe, it, expect } from 'vitest'
import { partialRatio, processText, ratio, tokenize, tokenSetRatio, tokenSortRatio } from '../text-similarity.js'

describe('text-similarity', () => {
  describe('processText', () => {
    it('lowercases and replaces punctuation with single spaces', () => {
      expect(processText('Apple iPhone-16 (Pro)!')).toBe('apple iphone 16 pro')
    })

    it('keeps non-ASCII letters', () => {
      expect(processText('Señor Café')).toBe('señor café')
    })
  })

  describe('tokenize', () => {
    it('splits processed text', () => {
      expect(tokenize('  Galaxy   S24+ ')).toEqual(['galaxy', 's24'])
    })

    it('returns no tokens for blank text', () => {
      expect(tokenize(' - ')).toEqual([])
    })
  })

  describe('ratio', () => {
    it('is 2 * LCS over total length', () => {
      expect(ratio('abcd', 'abce')).toBe(0.75)
      expect(ratio('abc', 'abc')).toBe(1)
    })

    it('is 0 when either side is empty', () => {
      expect(ratio('', 'abc')).toBe(0)
      expect(ratio('abc', '')).toBe(0)
    })
  })

  describe('partialRatio', () => {
    it('is 1 when the shorter string occurs in the longer', () => {
      expect(partialRatio('pro', 'iPhone 16 Pro')).toBe(1)
    })

    it('takes the best same-length window', () => {
      expect(partialRatio('abcd', 'xxabcexx')).toBe(0.75)
    })

    it('is 0 for empty input', () => {
      expect(partialRatio('', 'iphone')).toBe(0)
    })
  })

  describe('tokenSortRatio', () => {
    it('ignores word order and punctuation', () => {
      expect(tokenSortRatio('Pro, iPhone 16', 'iphone 16 pro')).toBe(1)
    })

    it('scores the Natural Titanium listing pair', () => {
      expect(
        tokenSortRatio('Apple iPhone 16 Pro 128GB - Natural Titanium', 'iPhone 16 Pro 128GB Natural Titanium (Unlocked)')
      ).toBeCloseTo(72 / 87, 6)
    })
  })

  describe('tokenSetRatio', () => {
    it('is 1 when one token set contains the other', () => {
      expect(tokenSetRatio('iphone 16 pro', 'Apple iPhone 16 Pro 128GB unlocked')).toBe(1)
    })

    it('is 0 for empty input', () => {
      expect(tokenSetRatio('', 'iphone')).toBe(0)
    })
  })
})
