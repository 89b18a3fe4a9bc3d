import { describe, it, expect } from 'vitest'
import { seededRandom, scriptedRandom, pickWeighted, randomInt, chance } from '../src/pong/random'
import { AI_TRICK_WEIGHTS } from '../src/pong/constants'

describe('Random Sources', () => {
  describe('seededRandom', () => {
    it('should repeat the same sequence for the same seed', () => {
      const a = seededRandom(42)
      const b = seededRandom(42)
      const seqA = Array.from({ length: 5 }, () => a())
      const seqB = Array.from({ length: 5 }, () => b())
      expect(seqA).toEqual(seqB)
    })

    it('should diverge for different seeds', () => {
      const a = seededRandom(42)
      const b = seededRandom(43)
      expect([a(), a(), a()]).not.toEqual([b(), b(), b()])
    })

    it('should stay within [0, 1)', () => {
      const random = seededRandom(7)
      for (let i = 0; i < 1000; i++) {
        const value = random()
        expect(value).toBeGreaterThanOrEqual(0)
        expect(value).toBeLessThan(1)
      }
    })
  })

  describe('scriptedRandom', () => {
    it('should replay draws in order and then refuse', () => {
      const random = scriptedRandom([0.1, 0.2])
      expect(random()).toBe(0.1)
      expect(random()).toBe(0.2)
      expect(() => random()).toThrow('Scripted random source exhausted after 2 draws')
    })
  })

  describe('pickWeighted', () => {
    it('should treat thresholds as exclusive upper bounds', () => {
      const pick = (roll: number) => pickWeighted(AI_TRICK_WEIGHTS, scriptedRandom([roll]))
      expect(pick(0)).toBe(0)
      expect(pick(0.2499)).toBe(0)
      expect(pick(0.25)).toBe(1)
      expect(pick(0.5)).toBe(2)
      expect(pick(0.55)).toBe(3)
      expect(pick(0.75)).toBe(4)
      expect(pick(0.9999)).toBe(4)
    })
  })

  describe('randomInt', () => {
    it('should cover both ends of the range', () => {
      expect(randomInt(-3, 3, scriptedRandom([0]))).toBe(-3)
      expect(randomInt(-3, 3, scriptedRandom([0.9999]))).toBe(3)
      expect(randomInt(-2, 2, scriptedRandom([0.5]))).toBe(0)
    })

    it('should return min for an empty range', () => {
      expect(randomInt(5, 1, scriptedRandom([]))).toBe(5)
    })

    it('should never exceed max even for a draw of 1', () => {
      expect(randomInt(0, 4, scriptedRandom([1]))).toBe(4)
    })
  })

  describe('chance', () => {
    it('should succeed below the probability only', () => {
      expect(chance(0.85, scriptedRandom([0.84]))).toBe(true)
      expect(chance(0.85, scriptedRandom([0.85]))).toBe(false)
    })
  })
})
