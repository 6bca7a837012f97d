import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { CorruptEnergyFileError, ENERGY_FILE, JsonFileEnergyStore, MemoryEnergyStore } from './energyStore.js'

describe('JsonFileEnergyStore', () => {
    let dir: string

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'energy-store-'))
    })

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true })
    })

    it('reads a missing file as empty', async () => {
        const store = new JsonFileEnergyStore(dir)
        expect(await store.load('inv-1')).toBeNull()
    })

    it('round-trips records per device', async () => {
        const store = new JsonFileEnergyStore(dir)
        await store.save('inv-1', { energyToday: 0.5, energyTotal: 381.5, updatedAt: 1000 })
        await store.save('inv-2', { energyToday: 1.2, energyTotal: 90, updatedAt: 2000 })

        const reopened = new JsonFileEnergyStore(dir)
        expect(await reopened.load('inv-1')).toEqual({ energyToday: 0.5, energyTotal: 381.5, updatedAt: 1000 })
        expect(await reopened.load('inv-2')).toEqual({ energyToday: 1.2, energyTotal: 90, updatedAt: 2000 })
        expect(await reopened.load('inv-3')).toBeNull()
    })

    it('creates the data directory on first write', async () => {
        const nested = path.join(dir, 'a', 'b')
        const store = new JsonFileEnergyStore(nested)
        await store.save('inv-1', { energyToday: 0, energyTotal: 1, updatedAt: 0 })

        const text = await fs.readFile(path.join(nested, ENERGY_FILE), 'utf8')
        expect(JSON.parse(text)).toEqual({ 'inv-1': { energyToday: 0, energyTotal: 1, updatedAt: 0 } })
    })

    it('keeps concurrent writes for different devices', async () => {
        const store = new JsonFileEnergyStore(dir)
        await Promise.all([
            store.save('inv-1', { energyToday: 1, energyTotal: 10, updatedAt: 1 }),
            store.save('inv-2', { energyToday: 2, energyTotal: 20, updatedAt: 2 }),
            store.save('inv-1', { energyToday: 3, energyTotal: 30, updatedAt: 3 }),
        ])

        expect(await store.load('inv-1')).toEqual({ energyToday: 3, energyTotal: 30, updatedAt: 3 })
        expect(await store.load('inv-2')).toEqual({ energyToday: 2, energyTotal: 20, updatedAt: 2 })
    })

    it('fails to load a corrupt file and replaces it on the next write', async () => {
        await fs.writeFile(path.join(dir, ENERGY_FILE), '{not json', 'utf8')
        const store = new JsonFileEnergyStore(dir)

        await expect(store.load('inv-1')).rejects.toBeInstanceOf(CorruptEnergyFileError)

        await store.save('inv-1', { energyToday: 0.5, energyTotal: 381.5, updatedAt: 5 })
        expect(await store.load('inv-1')).toEqual({ energyToday: 0.5, energyTotal: 381.5, updatedAt: 5 })
    })

    it.each(['null', '[]', '42', '"text"'])('replaces a file whose root is %s on the next write', async content => {
        await fs.writeFile(path.join(dir, ENERGY_FILE), content, 'utf8')
        const store = new JsonFileEnergyStore(dir)

        await expect(store.load('inv-1')).rejects.toThrow('energy store is not a JSON object')

        await store.save('inv-1', { energyToday: 0.5, energyTotal: 381.5, updatedAt: 5 })
        await store.save('inv-2', { energyToday: 1, energyTotal: 2, updatedAt: 6 })
        expect(await store.load('inv-1')).toEqual({ energyToday: 0.5, energyTotal: 381.5, updatedAt: 5 })
        expect(await store.load('inv-2')).toEqual({ energyToday: 1, energyTotal: 2, updatedAt: 6 })
    })

    it('skips entries that are not energy records', async () => {
        const content = {
            good: { energyToday: 1, energyTotal: 2, updatedAt: 3 },
            bad: { energyToday: 'one', energyTotal: 2, updatedAt: 3 },
        }
        await fs.writeFile(path.join(dir, ENERGY_FILE), JSON.stringify(content), 'utf8')
        const store = new JsonFileEnergyStore(dir)

        expect(await store.load('good')).toEqual({ energyToday: 1, energyTotal: 2, updatedAt: 3 })
        expect(await store.load('bad')).toBeNull()
    })
})

describe('MemoryEnergyStore', () => {
    it('returns copies of what was saved', async () => {
        const store = new MemoryEnergyStore()
        const record = { energyToday: 1, energyTotal: 2, updatedAt: 3 }
        await store.save('inv-1', record)
        record.energyTotal = 99

        expect(await store.load('inv-1')).toEqual({ energyToday: 1, energyTotal: 2, updatedAt: 3 })
    })
})
