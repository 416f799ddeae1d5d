import 'reflect-metadata'
import 'dotenv/config'
import { readFileSync } from 'fs'
import { join } from 'path'
import { DataSource } from 'typeorm'
import configuration from '../src/config/configuration'
import { ENTITIES, IdTagEntity } from '../src/persistence/entities'
import { TAG_STATUSES, type TagStatus } from '../src/session/session.types'

type SeedTag = {
  tag: string
  status: TagStatus
  expiryDate: Date | null
  parentTag: string | null
  holderName: string | null
}

function isTagStatus(value: unknown): value is TagStatus {
  return TAG_STATUSES.some((status) => status === value)
}

function optionalString(value: unknown, field: string, index: number): string | null {
  if (value === undefined || value === null) return null
  if (typeof value !== 'string') {
    throw new Error(`Entry ${index}: ${field} must be a string`)
  }
  return value
}

function parseSeedTags(raw: unknown): SeedTag[] {
  if (!Array.isArray(raw)) {
    throw new Error('Seed file must contain a JSON array')
  }
  return raw.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Entry ${index} must be an object`)
    }
    const tag = 'tag' in entry ? entry.tag : undefined
    if (typeof tag !== 'string' || tag.length === 0 || tag.length > 20) {
      throw new Error(`Entry ${index}: tag must be 1-20 characters`)
    }
    const status = 'status' in entry ? entry.status : 'Accepted'
    if (!isTagStatus(status)) {
      throw new Error(`Entry ${index}: status must be one of ${TAG_STATUSES.join(', ')}`)
    }
    const expiry = optionalString('expiryDate' in entry ? entry.expiryDate : undefined, 'expiryDate', index)
    const expiryDate = expiry ? new Date(expiry) : null
    if (expiryDate && Number.isNaN(expiryDate.getTime())) {
      throw new Error(`Entry ${index}: expiryDate is not a valid date`)
    }
    return {
      tag,
      status,
      expiryDate,
      parentTag: optionalString('parentTag' in entry ? entry.parentTag : undefined, 'parentTag', index),
      holderName: optionalString('holderName' in entry ? entry.holderName : undefined, 'holderName', index),
    }
  })
}

async function main(): Promise<void> {
  const file = process.argv[2] || join(__dirname, 'fixtures', 'id-tags.json')
  const tags = parseSeedTags(JSON.parse(readFileSync(file, 'utf8')))
  const { database } = configuration()
  const dataSource = new DataSource({
    type: 'postgres',
    url: database.url,
    ssl: database.ssl ? { rejectUnauthorized: false } : false,
    entities: ENTITIES,
  })
  await dataSource.initialize()
  try {
    await dataSource.getRepository(IdTagEntity).upsert(tags, ['tag'])
    console.log(`Seeded ${tags.length} id tags from ${file}`)
  } finally {
    await dataSource.destroy()
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error)
  process.exit(1)
})
