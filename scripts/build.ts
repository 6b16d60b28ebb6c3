import * as esbuild from 'esbuild'
import {fileURLToPath} from 'node:url'

const entryPoint = fileURLToPath(new URL('../src/cli/index.ts', import.meta.url))
const outfile = fileURLToPath(new URL('../dist/cli.js', import.meta.url))

/**
 * Bundle the CLI into a single ESM file. Board data and package.json are
 * inlined; npm dependencies stay external and load from node_modules.
 */
async function buildCli() {
  console.log('Building CLI bundle...')

  const result = await esbuild.build({
    entryPoints: [entryPoint],
    outfile,
    bundle: true,
    format: 'esm',
    platform: 'node',
    target: 'node20',
    packages: 'external',
    metafile: true,
  })

  const bytes = Object.values(result.metafile.outputs).reduce((sum, output) => sum + output.bytes, 0)
  console.log(`✓ Bundle written to ${outfile}`)
  console.log(`  Size: ${(bytes / 1024).toFixed(2)} KB`)
}

buildCli().catch(err => {
  console.error('Build failed:', err)
  process.exit(1)
})
