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

import { BoundaryIterator, DONE, IntlBoundarySegmenter } from '../../lib/tokenizer/segmenter';

const segmenter = new IntlBoundarySegmenter('en-US');

function allBoundaries(iterator : BoundaryIterator) : number[] {
    const boundaries = [iterator.first()];
    let next = iterator.next();
    while (next !== DONE) {
        boundaries.push(next);
        next = iterator.next();
    }
    return boundaries;
}

const WORD_TEST_CASES : Array<[string, number[]]> = [
    ['', [0]],
    ['hello world', [0, 5, 6, 11]],
    ['Hi, there!', [0, 2, 3, 4, 9, 10]],
    // horizontal whitespace stays together
    ['a  b', [0, 1, 3, 4]],
    ["don't stop", [0, 5, 6, 10]],
    ['Gavrilo Principe', [0, 7, 8, 16]],
];

function testWordBoundaries() {
    for (const [text, expected] of WORD_TEST_CASES)
        assert.deepStrictEqual(allBoundaries(segmenter.words(text)), expected, `word boundaries of ${JSON.stringify(text)}`);
}

function testSentenceBoundaries() {
    assert.deepStrictEqual(allBoundaries(segmenter.sentences('')), [0]);
    assert.deepStrictEqual(allBoundaries(segmenter.sentences('Hello there. How are you?')), [0, 13, 25]);
}

function testIsBoundary() {
    const words = segmenter.words('Gavrilo Principe');
    assert.strictEqual(words.isBoundary(0), true);
    assert.strictEqual(words.isBoundary(7), true);
    assert.strictEqual(words.isBoundary(8), true);
    assert.strictEqual(words.isBoundary(15), false);
    assert.strictEqual(words.isBoundary(16), true);
    assert.strictEqual(words.isBoundary(17), false);
    assert.strictEqual(words.isBoundary(-1), false);

    // isBoundary does not move the cursor
    assert.strictEqual(words.first(), 0);
    words.isBoundary(16);
    assert.strictEqual(words.next(), 7);
}

function testAdvanceTo() {
    const words = segmenter.words('Gavrilo Princip.');
    assert.strictEqual(words.first(), 0);
    assert.strictEqual(words.next(), 7);
    assert.strictEqual(words.advanceTo(15), 15);
    // already there
    assert.strictEqual(words.advanceTo(15), 15);
    assert.strictEqual(words.next(), 16);
    assert.strictEqual(words.next(), DONE);
    assert.strictEqual(words.advanceTo(20), DONE);
    assert.strictEqual(words.next(), DONE);

    // advancing to an offset inside a segment stops at the end of that segment
    const other = segmenter.words('Gavrilo Princip.');
    other.first();
    assert.strictEqual(other.advanceTo(10), 15);
}

function testIndependentCursors() {
    const first = segmenter.words('hello world');
    const second = segmenter.words('hello world');
    first.first();
    second.first();
    assert.strictEqual(first.next(), 5);
    assert.strictEqual(first.next(), 6);
    assert.strictEqual(second.next(), 5);
}

export default async function main() {
    assert.strictEqual(segmenter.locale, 'en-US');
    testWordBoundaries();
    testSentenceBoundaries();
    testIsBoundary();
    testAdvanceTo();
    testIndependentCursors();
}
if (!module.parent)
    main();
