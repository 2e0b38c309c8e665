/**
 * pixmap CLI - inspect and dump Netpbm images
 */

import { statSync } from 'node:fs'
import {
	type PnmImage,
	getFormatName,
	getImageFormat,
	getTupleType,
	loadPnm,
} from '@pixmap/codecs'
import { type DecodeError, formatPixel, getExtension, getMimeType } from '@pixmap/core'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface CliOptions {
	info?: boolean
	dump?: boolean
	json?: boolean
	verbose?: boolean
	quiet?: boolean
	formats?: boolean
	help?: boolean
	version?: boolean
}

/**
 * Where results and diagnostics go
 */
export interface CliOutput {
	log(line: string): void
	error(line: string): void
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const VERSION = '0.1.0'

const SUPPORTED_FORMATS = [
	'P1  PBM (ASCII)',
	'P2  PGM (ASCII)',
	'P3  PPM (ASCII)',
	'P4  PBM (raw)',
	'P5  PGM (raw)',
	'P6  PPM (raw)',
	'P7  PAM (depth 1-4)',
]

const HELP = `
pixmap - Netpbm image decoder

USAGE:
  pixmap <file...>                Print dimensions and format
  pixmap --info <file...>         Show header details
  pixmap --dump <file>            Print pixels as 0xRRGGBBAA, one row per line
  pixmap --formats                List supported formats

OPTIONS:
  -i, --info            Show header details
  -d, --dump            Dump decoded pixels
  --json                Output as JSON
  -v, --verbose         Verbose output
  --quiet               Only print errors
  --help                Show this help
  --version             Show version

EXAMPLES:
  pixmap photo.ppm                 # photo.ppm: 640 x 480 PPM (raw)
  pixmap --info scan.pgm           # Header fields
  pixmap --dump --json icon.pam    # Pixels as JSON
`

const consoleOutput: CliOutput = {
	log: (line) => console.log(line),
	error: (line) => console.error(line),
}

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

export function parseArgs(args: readonly string[]): { inputs: string[]; options: CliOptions } {
	const inputs: string[] = []
	const options: CliOptions = {}

	for (const arg of args) {
		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--formats') {
			options.formats = true
		} else if (arg === '--info' || arg === '-i') {
			options.info = true
		} else if (arg === '--dump' || arg === '-d') {
			options.dump = true
		} else if (arg === '--json') {
			options.json = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (!arg.startsWith('-')) {
			inputs.push(arg)
		} else {
			throw new Error(`Unknown option: ${arg}`)
		}
	}

	return { inputs, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────────────────

function describeLayout(image: PnmImage): string {
	const { depth, tupleType } = image.header
	return tupleType ?? getTupleType(depth) ?? `${depth} channels`
}

function renderSummary(file: string, image: PnmImage): string {
	return `${file}: ${image.width} x ${image.height} ${getFormatName(image.header.format)}`
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function renderInfo(file: string, image: PnmImage): string[] {
	const { header } = image
	const family = getImageFormat(header.format)
	return [
		`File: ${file}`,
		`Size: ${formatBytes(statSync(file).size)}`,
		`Format: ${getFormatName(header.format)} [${header.format}]`,
		`MIME: ${getMimeType(family)}`,
		`Extension: .${getExtension(family)}`,
		`Dimensions: ${image.width} x ${image.height}`,
		`Pixels: ${image.pixels.length.toLocaleString('en-US')}`,
		`Maxval: ${header.maxVal}`,
		`Depth: ${header.depth} (${describeLayout(image)})`,
	]
}

function renderRows(image: PnmImage): string[] {
	const rows: string[] = []
	for (let y = 0; y < image.height; y++) {
		const row = image.pixels.subarray(y * image.width, (y + 1) * image.width)
		rows.push(Array.from(row, formatPixel).join(' '))
	}
	return rows
}

function renderJson(file: string, image: PnmImage, options: CliOptions): string {
	const { header } = image
	return JSON.stringify({
		file,
		format: header.format,
		width: image.width,
		height: image.height,
		maxVal: header.maxVal,
		depth: header.depth,
		...(header.tupleType === undefined ? {} : { tupleType: header.tupleType }),
		...(options.dump ? { pixels: Array.from(image.pixels, formatPixel) } : {}),
	})
}

function renderError(file: string, error: DecodeError, options: CliOptions): string {
	const where = options.verbose && error.offset !== undefined ? ` (at byte ${error.offset})` : ''
	return `${file}: ${error.code}: ${error.message}${where}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Run the CLI and return the process exit code
 */
export function runCli(args: readonly string[], output: CliOutput = consoleOutput): number {
	let parsed: { inputs: string[]; options: CliOptions }
	try {
		parsed = parseArgs(args)
	} catch (err) {
		output.error(err instanceof Error ? err.message : String(err))
		return 1
	}
	const { inputs, options } = parsed

	if (options.help || (inputs.length === 0 && !options.formats && !options.version)) {
		output.log(HELP)
		return 0
	}

	if (options.version) {
		output.log(`pixmap v${VERSION}`)
		return 0
	}

	if (options.formats) {
		output.log('Supported Formats:')
		for (const format of SUPPORTED_FORMATS) output.log(`  ${format}`)
		return 0
	}

	let failures = 0

	for (const file of inputs) {
		const result = loadPnm(file)
		if (!result.ok) {
			failures++
			output.error(renderError(file, result.error, options))
			continue
		}
		if (options.quiet) continue

		const { image } = result
		if (options.json) {
			output.log(renderJson(file, image, options))
			continue
		}

		if (options.info || options.verbose) {
			for (const line of renderInfo(file, image)) output.log(line)
		} else {
			output.log(renderSummary(file, image))
		}
		if (options.dump) {
			for (const line of renderRows(image)) output.log(line)
		}
	}

	return failures === 0 ? 0 : 1
}
