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

import BaseTokenizer, { classifySegment } from './tokenizer/base';
import ProperNameTokenizer, { allProperNames } from './tokenizer/proper-name-tokenizer';
import ProperNameDictionary, { keyOf } from './tokenizer/proper-names';
import { IntlBoundarySegmenter, DONE } from './tokenizer/segmenter';
import { Document, Sentence, isWordToken } from './tokenizer/tokens';
import * as Dictionary from './tokenizer/dictionary';
import * as Config from './config';
import { DictionaryError } from './errors';

export type { TokenizerOptions, SpanMatch } from './tokenizer/base';
export type { BoundaryIterator, BoundarySegmenter } from './tokenizer/segmenter';
export type {
    Token,
    TokenType,
    WordToken,
    ProperWordToken,
    NonWordToken,
    SentenceJSON,
    DocumentJSON,
} from './tokenizer/tokens';

export {
    // tokenizers
    BaseTokenizer,
    ProperNameTokenizer,
    classifySegment,
    allProperNames,

    // proper name dictionary
    ProperNameDictionary,
    keyOf,
    Dictionary,
    DictionaryError,

    // segmentation
    IntlBoundarySegmenter,
    DONE,

    // token model
    Document,
    Sentence,
    isWordToken,

    Config,
};
