import packageJson from '../../../package.json'

export function getCliName(): string {
  const firstKey = Object.keys(packageJson.bin)[0]
  if (!firstKey) {
    throw new Error('Unable to determine CLI name from package.json `bin` field')
  }
  return firstKey
}

export function getCliVersion(): string {
  return packageJson.version
}
