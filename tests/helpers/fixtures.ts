import path from 'path'

export const FIXTURE_DIR = path.join(__dirname, '..', 'fixtures', 'dialects')

export function fixture(name: string): string {
  return path.join(FIXTURE_DIR, name)
}
