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

import { DEFAULT_LOCALE } from '../config';
import { BoundaryIterator, BoundarySegmenter, DONE, IntlBoundarySegmenter } from './segmenter';
import { Document, Sentence, Token, makeNonWord, makeWord } from './tokens';

// a word starts with a letter or a decimal digit, in any script
const WORD_START = /^[\p{L}\p{Nd}]/u;

export interface TokenizerOptions {
    locale ?: string;
    segmenter ?: BoundarySegmenter;
}

/**
 * A span of the sentence claimed by a subclass, starting at the current
 * position. `length` is the number of UTF-16 code units it covers.
 */
export interface SpanMatch {
    token : Token;
    length : number;
}

export function classifySegment(text : string) : Token {
    if (WORD_START.test(text))
        return makeWord(text);
    else
        return makeNonWord(text);
}

// This is the base class of all document tokenizers. It splits the text into
// sentences, and each sentence into a gap-free sequence of word and non-word tokens.
//
// The segmentation itself is delegated to a BoundarySegmenter, which implements
// the locale-specific Unicode rules.
export default class BaseTokenizer {
    readonly locale : string;
    protected readonly _segmenter : BoundarySegmenter;

    constructor(options : TokenizerOptions = {}) {
        this.locale = options.locale ?? options.segmenter?.locale ?? DEFAULT_LOCALE;
        this._segmenter = options.segmenter ?? new IntlBoundarySegmenter(this.locale);
    }

    parseDocument(text : string) : Document {
        const sentences : Sentence[] = [];

        const iterator = this._segmenter.sentences(text);
        let firstIndex = iterator.first();
        let lastIndex = iterator.next();
        while (lastIndex !== DONE) {
            sentences.push(this.parseSentence(text.substring(firstIndex, lastIndex)));
            firstIndex = lastIndex;
            lastIndex = iterator.next();
        }
        return new Document(sentences);
    }

    parseSentence(source : string) : Sentence {
        const tokens : Token[] = [];

        const words = this._segmenter.words(source);
        let firstIndex = words.first();
        let lastIndex = words.next();
        while (lastIndex !== DONE) {
            const segment = source.substring(firstIndex, lastIndex);
            const match = this._matchSpan(segment, source, firstIndex, words);

            if (match === null) {
                tokens.push(classifySegment(segment));
                firstIndex = lastIndex;
                lastIndex = words.next();
                continue;
            }

            // skip every segment covered by the match, then resume from the
            // first boundary at or after its end
            tokens.push(match.token);
            firstIndex = words.advanceTo(firstIndex + match.length);
            lastIndex = firstIndex === DONE ? DONE : words.next();
        }
        return new Sentence(tokens);
    }

    /**
     * Hook for subclasses to claim a span of the sentence that starts at
     * `firstIndex`, where the current segment is `segment`.
     *
     * The span must end on a word boundary of `words`. The base tokenizer
     * never claims anything.
     */
    protected _matchSpan(segment : string,
                         source : string,
                         firstIndex : number,
                         words : BoundaryIterator) : SpanMatch|null {
        return null;
    }
}
