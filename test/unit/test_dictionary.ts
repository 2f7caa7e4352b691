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

import assert from 'assert';
import * as path from 'path';
import { Readable } from 'stream';

import {
    getDefaultProperNames,
    loadDefaultProperNames,
    loadDictionary,
    loadDictionaryFile,
    parseDictionary,
} from '../../lib/tokenizer/dictionary';
import { DictionaryError } from '../../lib/errors';

const DICTIONARY_FILE = path.resolve(__dirname, '../data/dictionary.txt');
const MISSING_FILE = path.resolve(__dirname, '../data/does-not-exist.txt');

function testParseDictionary() {
    const names = parseDictionary('Gavrilo Princip\r\n  Sarajevo \n\nSerbia\nSerbia\n');
    assert.deepStrictEqual([...names], ['Gavrilo Princip', 'Sarajevo', 'Serbia']);
    assert.strictEqual(parseDictionary('').size, 0);
}

async function testLoadDictionary() {
    // lines can be split across chunks, and the last line has no newline
    const input = Readable.from(['Franz Ferdinand\nSara', 'jevo\n\n', ' Sophie Chotek '], { objectMode: false });
    const names = await loadDictionary(input);
    assert.deepStrictEqual([...names], ['Franz Ferdinand', 'Sarajevo', 'Sophie Chotek']);
}

async function testLoadDictionaryFile() {
    const names = await loadDictionaryFile(DICTIONARY_FILE);
    assert.deepStrictEqual([...names], ['Gavrilo Princip', 'Sophie Chotek', 'Sarajevo']);

    await assert.rejects(loadDictionaryFile(MISSING_FILE), (err : unknown) => {
        assert.ok(err instanceof DictionaryError);
        assert.strictEqual(err.code, 'ENOENT');
        assert.strictEqual(err.filename, MISSING_FILE);
        return true;
    });
}

function testDefaultProperNames() {
    assert.deepStrictEqual([...loadDefaultProperNames(DICTIONARY_FILE)], ['Gavrilo Princip', 'Sophie Chotek', 'Sarajevo']);

    // a missing default dictionary is not fatal
    assert.strictEqual(loadDefaultProperNames(MISSING_FILE).size, 0);

    const names = getDefaultProperNames();
    assert.ok(names.has('Gavrilo Princip'));
    assert.strictEqual(getDefaultProperNames(), names);
}

export default async function main() {
    testParseDictionary();
    await testLoadDictionary();
    await testLoadDictionaryFile();
    testDefaultProperNames();
}
if (!module.parent)
    main();
