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

import BaseTokenizer, { SpanMatch, TokenizerOptions } from './base';
import { BoundaryIterator } from './segmenter';
import { Document, makeProperWord } from './tokens';
import ProperNameDictionary from './proper-names';
import { getDefaultProperNames } from './dictionary';

/**
 * Collect the distinct proper names in a parsed document, sorted
 * by UTF-16 code unit order.
 */
export function allProperNames(doc : Document) : string[] {
    const names = new Set<string>();
    for (const sentence of doc.sentences()) {
        for (const tok of sentence.tokens) {
            if (tok.type === 'proper-word')
                names.add(tok.text);
        }
    }
    return Array.from(names).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * A document tokenizer that recognizes the names in a proper name dictionary,
 * and emits each occurrence as a single proper word token.
 *
 * Whenever the current segment is the first word of some name, the candidates
 * for that word are tried longest first; a candidate matches if the sentence
 * continues with it verbatim and it ends on a word boundary, so "Gavrilo Princip"
 * matches in "Gavrilo Princip." but not in "Gavrilo Principe".
 */
export default class ProperNameTokenizer extends BaseTokenizer {
    readonly dictionary : ProperNameDictionary;

    /**
     * @param properNames the names to recognize; defaults to the bundled dictionary
     */
    constructor(properNames : Iterable<string> = getDefaultProperNames(), options : TokenizerOptions = {}) {
        super(options);
        this.dictionary = new ProperNameDictionary(properNames);
    }

    static allProperNames(doc : Document) : string[] {
        return allProperNames(doc);
    }

    /**
     * Find the longest proper name under `word` that occurs in `source` at `idx`.
     *
     * @return the matched name, or null if no candidate matches
     */
    findProperName(word : string, source : string, idx : number, words : BoundaryIterator) : string|null {
        for (const candidate of this.dictionary.candidatesForKey(word)) {
            if (source.startsWith(candidate, idx) && words.isBoundary(idx + candidate.length))
                return candidate;
        }
        return null;
    }

    protected _matchSpan(segment : string,
                         source : string,
                         firstIndex : number,
                         words : BoundaryIterator) : SpanMatch|null {
        if (!this.dictionary.has(segment))
            return null;

        const name = this.findProperName(segment, source, firstIndex, words);
        if (name === null)
            return null;
        return { token: makeProperWord(name), length: name.length };
    }
}
