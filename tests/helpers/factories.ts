import { faker } from '@faker-js/faker'
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import type { TLetterRequest } from '../../src/domains/letters/types.ts'

export type TLetterDTO = {
  id: string
  status: 'queued' | 'printed' | 'sent'
  label: string | null
  recipient: { name: string; city: string; country: string }
  createdAt: string
}

export function makeLetterRequest(overrides?: Partial<TLetterRequest>): TLetterRequest {
  return {
    pdfPath: overrides?.pdfPath ?? '/tmp/letter.pdf',
    name: overrides?.name ?? faker.person.fullName(),
    street: overrides?.street ?? faker.location.streetAddress(),
    zip: overrides?.zip ?? faker.location.zipCode('#####'),
    city: overrides?.city ?? faker.location.city(),
    country: overrides?.country,
    type: overrides?.type,
    label: overrides?.label,
  }
}

export function makeLetter(overrides?: Partial<TLetterDTO>): TLetterDTO {
  return {
    id: overrides?.id ?? faker.string.uuid(),
    status: overrides?.status ?? faker.helpers.arrayElement(['queued', 'printed', 'sent']),
    label: overrides?.label ?? null,
    recipient: overrides?.recipient ?? {
      name: faker.person.fullName(),
      city: faker.location.city(),
      country: 'DE',
    },
    createdAt: overrides?.createdAt ?? new Date().toISOString(),
  }
}

export type TScratchDir = {
  path: string
  write(name: string, contents: string | Buffer): Promise<string>
  cleanup(): Promise<void>
}

/** Creates a temporary directory for documents and secrets files. */
export async function makeScratchDir(): Promise<TScratchDir> {
  const path = await mkdtemp(join(tmpdir(), 'agentic-letters-test-'))
  return {
    path,
    write: async (name, contents) => {
      const filePath = join(path, name)
      await writeFile(filePath, contents)
      return filePath
    },
    cleanup: () => rm(path, { recursive: true, force: true }),
  }
}
