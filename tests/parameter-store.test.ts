import { describe, expect, it, vi } from 'vitest'

import {
  AmbiguousNameError,
  UnknownNameError,
  ValidationError
} from '../src/core/errors.js'
import type { Logger } from '../src/core/types.js'
import { ParameterStore } from '../src/params/store.js'
import { parseParFile } from '../src/schema/par-line.js'
import { SchemaRegistry } from '../src/schema/registry.js'
import { bundledSchemaPath } from '../src/config/load.js'

function makeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

async function bundled(tool: string): Promise<ParameterStore> {
  const registry = new SchemaRegistry()
  await registry.loadJson(bundledSchemaPath())
  return ParameterStore.fromRegistry(registry, tool, makeLogger())
}

function inline(lines: string[]): ParameterStore {
  return new ParameterStore(parseParFile('t', lines.join('\n')), makeLogger())
}

describe('ParameterStore names', () => {
  it('accepts exact names and unique prefixes', async () => {
    const store = await bundled('dmstat')
    expect(store.resolveName('centroid')).toBe('centroid')
    expect(store.resolveName('cen')).toBe('centroid')
    expect(store.resolveName('med')).toBe('median')
    expect(store.resolveName('inf')).toBe('infile')
    expect(store.resolveName('out_min')).toBe('out_min')
  })

  it('prefers an exact name that is also a prefix of another', () => {
    const store = inline(['out,s,h,"",,,', 'outfile,f,h,"",,,'])
    expect(store.resolveName('out')).toBe('out')
    store.set('out', 'a')
    expect(store.get('outfile')).toBeNull()
  })

  it('reports unknown names', async () => {
    const store = await bundled('dmstat')
    expect(() => store.get('foo')).toThrow(UnknownNameError)
    expect(() => store.get('foo')).toThrow("There is no parameter for dmstat that matches 'foo'")
    expect(() => store.set('CENTROID', true)).toThrow(UnknownNameError)
  })

  it('lists the candidates for an ambiguous prefix', async () => {
    const store = await bundled('dmstat')
    expect(() => store.set('c', true)).toThrow(AmbiguousNameError)
    expect(() => store.set('c', true)).toThrow(
      "Multiple matches for dmstat parameter 'c', choose from:\n  centroid clip"
    )
  })
})

describe('ParameterStore coercion', () => {
  it.each([true, 1, '1', 'yes', 'YES', 'true', 'on', ' On '])('reads %j as true', async (value) => {
    const store = await bundled('dmstat')
    store.set('median', value)
    expect(store.get('median')).toBe(true)
  })

  it.each([false, 0, '0', 'no', 'False', 'off'])('reads %j as false', async (value) => {
    const store = await bundled('dmstat')
    store.set('centroid', value)
    expect(store.get('centroid')).toBe(false)
  })

  it.each(['truthy', 'falsey', 'ya', ''])('rejects %j as a boolean', async (value) => {
    const store = await bundled('dmstat')
    expect(() => store.set('sigma', value)).toThrow(
      `The dmstat.sigma value should be a boolean, not '${value}'`
    )
    expect(store.get('sigma')).toBe(true)
  })

  it('converts integers and rejects fractions', async () => {
    const store = await bundled('dmstat')
    expect(store.set('maxiter', '5')).toBe(5)
    expect(store.set('verbose', '')).toBe(0)
    expect(store.set('verbose', 'INDEF')).toBeNull()
    expect(() => store.set('maxiter', '2.5')).toThrow(
      "The dmstat.maxiter value should be an integer, not '2.5'"
    )
    expect(() => store.set('maxiter', 2.5)).toThrow(ValidationError)
    expect(store.get('maxiter')).toBe(5)
  })

  it('converts reals', async () => {
    const store = await bundled('dmstat')
    expect(store.set('nsigma', '1e3')).toBe(1000)
    expect(store.set('nsigma', 2.5)).toBe(2.5)
    expect(store.set('nsigma', '')).toBe(0)
    expect(() => store.set('nsigma', 'abc')).toThrow(
      "The dmstat.nsigma value should be a number, not 'abc'"
    )
  })

  it('stores empty text as null and joins lists', async () => {
    const store = await bundled('dmstat')
    expect(store.set('infile', '')).toBeNull()
    expect(store.set('infile', ['a.fits', 'b.fits'])).toBe('a.fits,b.fits')
    expect(store.set('out_mean', 12)).toBe('12')
  })
})

describe('ParameterStore constraints', () => {
  it('enforces integer ranges with inclusive bounds', async () => {
    const store = await bundled('dmstat')
    expect(() => store.set('maxiter', 0)).toThrow('dmstat.maxiter must be >= 1 but set to 0')
    expect(() => store.set('verbose', 6)).toThrow('dmstat.verbose must be <= 5 but set to 6')
    expect(store.set('verbose', 0)).toBe(0)
    expect(store.set('verbose', 5)).toBe(5)
    expect(store.set('maxiter', 100000)).toBe(100000)
  })

  it('enforces real ranges', async () => {
    const store = await bundled('vtpdetect')
    expect(() => store.set('mincutoff', -1)).toThrow('vtpdetect.mincutoff must be >= 0 but set to -1')
    expect(() => store.set('mincutoff', 30)).toThrow('vtpdetect.mincutoff must be <= 10 but set to 30')
    expect(() => store.set('mincutoff', 10.000001)).toThrow(ValidationError)
    expect(store.set('mincutoff', 10)).toBe(10)
  })

  it('expands option abbreviations', async () => {
    const store = await bundled('dmimg2jpg')
    expect(store.set('scalefunction', 'lin')).toBe('linear')
    expect(store.set('scalefunction', 'as')).toBe('asinh')
    expect(store.set('scalefunction', 'log')).toBe('log')
  })

  it('rejects ambiguous and unknown options', async () => {
    const store = await bundled('dmimg2jpg')
    expect(() => store.set('scalefunction', 'l')).toThrow(
      'The parameter scalefunction was set to l which matches multiple options:\n  log linear'
    )
    expect(() => store.set('scalefunction', 'cubic')).toThrow(
      'The parameter scalefunction was set to cubic when it must be one of:\n  log linear power asinh'
    )
    expect(() => store.set('scalefunction', '')).toThrow(ValidationError)
    expect(store.get('scalefunction')).toBe('log')
  })

  it('matches numeric options exactly', () => {
    const store = inline(['binning,i,h,1,1|2|4,,"Binning"'])
    expect(store.set('binning', '2')).toBe(2)
    expect(() => store.set('binning', 3)).toThrow(
      'The parameter binning was set to 3 when it must be one of:\n  1 2 4'
    )
  })

  it('names the type a value is checked as in the debug trace', () => {
    const logger = makeLogger()
    const store = new ParameterStore(parseParFile('t', 'label,s,h,"",,,\nevents,f,h,"",,,'), logger)

    store.validate('label', 'x')
    store.validate('events', 'evt.fits')

    expect(logger.debug).toHaveBeenCalledWith(
      'store.validate',
      expect.objectContaining({ name: 'label', as: 'a string' })
    )
    expect(logger.debug).toHaveBeenCalledWith(
      'store.validate',
      expect.objectContaining({ name: 'events', as: 'a filename' })
    )
  })
})

describe('ParameterStore redirects', () => {
  it('resolves a redirected lower bound before checking', () => {
    const store = inline(['x,r,h,INDEF,)y,,"X value"', 'y,r,h,0,,,"Y value"'])
    store.set('y', 10)

    expect(() => store.validate('x', 9)).toThrow('t.x must be >= 10 but set to 9')
    expect(store.validate('x', 11)).toEqual({ kind: 'literal', value: 11 })
    expect(store.get('x')).toBeNull()
  })

  it('keeps redirect values and checks the value they resolve to', () => {
    const store = inline(['a,i,h,1,0,10,"A"', 'b,i,h,3,,,"B"'])

    expect(store.set('a', ')b')).toBe(')b')
    expect(store.get('a')).toBe(')b')
    expect(store.resolve('a')).toBe(3)

    store.set('b', 50)
    expect(store.resolve('a')).toBe(50)
    expect(() => store.set('a', ')b')).toThrow('t.a must be <= 10 but set to 50')
  })

  it('rejects redirects to unknown parameters', () => {
    const store = inline(['a,i,h,1,,,"A"'])
    expect(() => store.set('a', ')zzz')).toThrow("Unable to resolve redirect t.a -> 'zzz'")
    expect(store.get('a')).toBe(1)
  })

  it('detects redirect cycles', () => {
    const store = inline(['c,s,h,")d",,,"C"', 'd,s,h,")c",,,"D"', 'a,i,h,1,,,"A"'])

    let caught: unknown
    try {
      store.resolve('c')
    } catch (error) {
      caught = error
    }
    expect(caught).toBeInstanceOf(ValidationError)
    expect(caught).toMatchObject({ kind: 'cycle', message: 'Redirect cycle detected for t.c: c -> d -> c' })

    expect(() => store.set('a', ')a')).toThrow('Redirect cycle detected for t.a: a -> a')
  })
})

describe('ParameterStore state', () => {
  it('restores defaults on reset, repeatedly', async () => {
    const store = await bundled('dmstat')
    const before = store.describe()

    store.set('infile', 'evt2.fits')
    store.set('centroid', false)
    store.set('maxiter', 2)
    store.reset()
    expect(store.describe()).toBe(before)
    store.reset()
    expect(store.describe()).toBe(before)
    expect(store.get('maxiter')).toBe(20)
    expect(store.defaultOf('maxi')).toBe(20)
  })

  it('iterates required parameters first, in declaration order', () => {
    const store = new ParameterStore(
      parseParFile('t', ['opt,i,h,1,,,', 'req,f,a,"",,,', 'flag,b,h,no,,,'].join('\n')),
      makeLogger()
    )
    expect(store.entries()).toEqual([
      ['req', null],
      ['opt', 1],
      ['flag', false]
    ])
    expect([...store]).toEqual(store.entries())
    expect(store.toObject()).toEqual({ req: null, opt: 1, flag: false })
  })

  it('rolls back to a snapshot', async () => {
    const store = await bundled('dmcopy')
    store.set('infile', 'in.fits')
    const snapshot = store.snapshot()
    store.set('infile', 'other.fits')
    store.set('clobber', true)
    store.restore(snapshot)
    expect(store.get('infile')).toBe('in.fits')
    expect(store.get('clobber')).toBe(false)
  })

  it('reports failures from trySet without throwing', async () => {
    const store = await bundled('dmstat')
    const bad = store.trySet('maxiter', 0)
    expect(bad.ok).toBe(false)
    if (!bad.ok) expect(bad.error).toBeInstanceOf(ValidationError)

    expect(store.trySet('maxiter', 3)).toEqual({ ok: true, value: 3 })
  })

  it('logs assignments at debug level', () => {
    const logger = makeLogger()
    const store = new ParameterStore(parseParFile('t', 'a,i,h,1,,,'), logger)
    store.set('a', 4)
    expect(logger.debug).toHaveBeenCalledWith('store.set', { tool: 't', name: 'a', value: 4 })
  })
})

describe('ParameterStore.describe', () => {
  it('lists required and optional parameters with their values', async () => {
    const store = await bundled('dmstat')
    store.set('infile', 'evt2.fits')
    store.set('centroid', false)
    store.set('nsigma', 2.5)
    store.set('maxiter', 2)

    const lines = store.describe().split('\n')
    expect(lines).toHaveLength(28)
    expect(lines[0]).toBe('Parameters for dmstat:')
    expect(lines[1]).toBe('')
    expect(lines[2]).toBe('Required parameters:')
    expect(lines[3]).toBe('              infile = evt2.fits        Input file specification')
    expect(lines[4]).toBe('')
    expect(lines[5]).toBe('Optional parameters:')
    expect(lines[6]).toBe('            centroid = False            Calculate centroid if image?')
    expect(lines[7]).toBe('              median = False            Calculate median value?')
    expect(lines[10]).toBe('              nsigma = 2.5              Number of sigma to clip')
    expect(lines[11]).toBe('             maxiter = 2                Maximum number of iterations')
    expect(lines[18]).toBe('            out_mean =                  Output Mean Value')
    expect(String(store)).toBe(store.describe())
  })
})
