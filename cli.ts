import { readFileSync, writeFileSync } from 'fs';
import { parseArgs } from 'util';
import { Parser, PmxError, ReferenceErrors, summarize } from './pmx';
import type { ParseOptions } from './pmx';

const USAGE = `usage: pmx2json [options] <file.pmx>

  -o, --out <file>       write the JSON document to <file> instead of stdout
  -s, --summary          print a summary instead of the JSON document
  -v, --verbose          trace every section to stderr
      --all-references   report every dangling index, not only the first
  -h, --help             show this help`;

export interface CliIo {
	readFile(path: string): Uint8Array;
	writeFile(path: string, text: string): void;
	stdout(text: string): void;
	stderr(text: string): void;
}

export const nodeIo: CliIo = {
	readFile: (path) => readFileSync(path),
	writeFile: (path, text) => writeFileSync(path, text),
	stdout: (text) => console.log(text),
	stderr: (text) => console.error(text),
};

function parseCommandLine(argv: string[]) {
	return parseArgs({
		args: argv,
		allowPositionals: true,
		options: {
			out: { type: 'string', short: 'o' },
			summary: { type: 'boolean', short: 's' },
			verbose: { type: 'boolean', short: 'v' },
			'all-references': { type: 'boolean' },
			help: { type: 'boolean', short: 'h' },
		},
	});
}

/**
 * Reads a PMX file and prints it as JSON (or a summary). Returns the exit
 * status: 0 on success, 1 when the file cannot be read or parsed, 2 on a
 * usage error.
 */
export function main(argv: string[], io: CliIo = nodeIo): number {
	var args: ReturnType<typeof parseCommandLine>;
	try {
		args = parseCommandLine(argv);
	} catch (err) {
		io.stderr(err instanceof Error ? err.message : String(err));
		io.stderr(USAGE);
		return 2;
	}
	var { values, positionals } = args;
	if (values.help) {
		io.stdout(USAGE);
		return 0;
	}
	if (positionals.length !== 1) {
		io.stderr(USAGE);
		return 2;
	}

	var file = positionals[0];
	var options: ParseOptions = {
		references: values['all-references'] ? 'all' : 'first',
	};
	if (values.verbose) {
		options.onSection = (section, count, offset) => io.stderr(`${section}: ${count} (end offset ${offset})`);
	}

	var bin: Uint8Array;
	try {
		bin = io.readFile(file);
	} catch (err) {
		io.stderr(`${file}: ${err instanceof Error ? err.message : String(err)}`);
		return 1;
	}

	var result = Parser.tryParse(bin, options);
	if (!result.ok) {
		reportError(io, file, result.error);
		return 1;
	}
	var text = values.summary ? summarize(result.pmx) : JSON.stringify(result.pmx, null, 2);
	if (values.out !== undefined) {
		io.writeFile(values.out, text + '\n');
	} else {
		io.stdout(text);
	}
	return 0;
}

function reportError(io: CliIo, file: string, error: PmxError) {
	io.stderr(`${file}: ${error.kind}: ${error.message}`);
	if (error instanceof ReferenceErrors) {
		for (var v of error.violations) {
			io.stderr(`  ${v.message}`);
		}
	}
}

// Copyright 2014 KATO Kanryu(k.kanryu@gmail.com)
//
//   Licensed under the Apache License, Version 2.0 (the "License");
//   you may not use this file except in compliance with the License.
//   You may obtain a copy of the License at
//
//       http://www.apache.org/licenses/LICENSE-2.0
//
//   Unless required by applicable law or agreed to in writing, software
//   distributed under the License is distributed on an "AS IS" BASIS,
//   WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
//   See the License for the specific language governing permissions and
//   limitations under the License.
