import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import path from 'node:path'
import { z } from 'zod'
import type { ResponseLanguage } from '../config.js'

const Hotline = z.object({
  name: z.string(),
  nameAr: z.string().optional(),
  number: z.string(),
  description: z.string().optional(),
  languages: z.array(z.string()).default([]),
  available: z.string().optional()
})

const EmergencyContact = z.object({
  name: z.string(),
  nameAr: z.string().optional(),
  number: z.string(),
  available: z.string()
})

const Facility = z.object({
  name: z.string(),
  nameAr: z.string().optional(),
  location: z.string().optional(),
  phone: z.string().optional(),
  description: z.string().optional(),
  services: z.array(z.string()).default([]),
  hours: z.string().optional()
})

const OnlineResource = z.object({
  name: z.string(),
  nameAr: z.string().optional(),
  url: z.string().url().optional(),
  description: z.string().optional()
})

const DirectoryFile = z.object({
  region: z.string(),
  primary: z.object({
    crisisLine: z.string(),
    emergency: z.string()
  }),
  hotlines: z.array(Hotline),
  emergencyContacts: z.array(EmergencyContact),
  hospitals: z.array(Facility).default([]),
  counselingCenters: z.array(Facility).default([]),
  onlineResources: z.array(OnlineResource).default([])
})

export type Hotline = z.infer<typeof Hotline>
export type EmergencyContact = z.infer<typeof EmergencyContact>
export type ResourceDirectory = z.infer<typeof DirectoryFile>

export const DEFAULT_DIRECTORY_PATH = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../../data/resources.json'
)

export function loadResourceDirectory(filePath: string = DEFAULT_DIRECTORY_PATH): ResourceDirectory {
  const parsed = DirectoryFile.parse(JSON.parse(readFileSync(filePath, 'utf-8')))
  return Object.freeze(parsed)
}

export function displayName(entry: { name: string; nameAr?: string }, language: ResponseLanguage): string {
  return language === 'ar' && entry.nameAr ? entry.nameAr : entry.name
}

/** Values available to `{placeholder}` substitution in templates. */
export function directoryValues(directory: ResourceDirectory): Record<string, string> {
  return {
    crisisLine: directory.primary.crisisLine,
    emergency: directory.primary.emergency
  }
}
