// -*- mode: typescript; indent-tabs-mode: nil; js-basic-offset: 4 -*-
//
// Copyright 2020 The Board of Trustees of the Leland Stanford Junior University
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//    http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import * as fs from 'fs';
import * as Stream from 'stream';
import { pipeline } from 'stream/promises';
import byline from 'byline';
import { getLogger } from 'log4js';

import { DEFAULT_DICTIONARY_PATH } from '../config';
import { DictionaryError } from '../errors';

const logger = getLogger('dictionary');

type WriteCallback = (err ?: Error) => void;

// collects the lines of a dictionary file as a set of names
class NameAccumulator extends Stream.Writable {
    readonly names : Set<string>;

    constructor() {
        super({ objectMode: true });

        this.names = new Set;
    }

    _write(line : string|Buffer, encoding : BufferEncoding, callback : WriteCallback) : void {
        const name = line.toString().trim();
        if (name)
            this.names.add(name);
        callback();
    }
}

/**
 * Parse a dictionary from a string, one name per line.
 */
export function parseDictionary(text : string) : Set<string> {
    const names = new Set<string>();
    for (const line of text.split(/\r?\n/)) {
        const name = line.trim();
        if (name)
            names.add(name);
    }
    return names;
}

/**
 * Read a dictionary from a stream, one name per line.
 */
export async function loadDictionary(input : Stream.Readable) : Promise<Set<string>> {
    const accumulator = new NameAccumulator();
    await pipeline(input.setEncoding('utf8'), byline(), accumulator);
    return accumulator.names;
}

export async function loadDictionaryFile(filename : string) : Promise<Set<string>> {
    try {
        return await loadDictionary(fs.createReadStream(filename));
    } catch(e) {
        throw new DictionaryError(filename, e);
    }
}

/**
 * Load a dictionary synchronously, falling back to an empty dictionary
 * if the file cannot be read.
 */
export function loadDefaultProperNames(filename : string) : ReadonlySet<string> {
    try {
        return parseDictionary(fs.readFileSync(filename, 'utf8'));
    } catch(e) {
        logger.warn(`failed to load default dictionary ${filename}: ${e instanceof Error ? e.message : String(e)}`);
        return new Set;
    }
}

let _defaultProperNames : ReadonlySet<string>|null = null;

/**
 * The default proper name dictionary.
 *
 * It is loaded the first time it is needed, and the same set is returned
 * for the lifetime of the process.
 */
export function getDefaultProperNames() : ReadonlySet<string> {
    if (_defaultProperNames === null)
        _defaultProperNames = loadDefaultProperNames(DEFAULT_DICTIONARY_PATH);
    return _defaultProperNames;
}
