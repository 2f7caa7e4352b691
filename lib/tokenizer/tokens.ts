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

export interface WordToken {
    readonly type : 'word';
    readonly text : string;
}

// a proper word is a word that matched an entry of the proper name dictionary;
// it can span several segments, including the whitespace between them
export interface ProperWordToken {
    readonly type : 'proper-word';
    readonly text : string;
}

export interface NonWordToken {
    readonly type : 'non-word';
    readonly text : string;
}

export type Token = WordToken | ProperWordToken | NonWordToken;
export type TokenType = Token['type'];

export function makeWord(text : string) : WordToken {
    return Object.freeze({ type: 'word', text });
}

export function makeProperWord(text : string) : ProperWordToken {
    return Object.freeze({ type: 'proper-word', text });
}

export function makeNonWord(text : string) : NonWordToken {
    return Object.freeze({ type: 'non-word', text });
}

export function isWordToken(token : Token) : token is WordToken|ProperWordToken {
    return token.type !== 'non-word';
}

export interface SentenceJSON {
    tokens : Token[];
}

export interface DocumentJSON {
    sentences : SentenceJSON[];
}

export class Sentence {
    readonly tokens : readonly Token[];

    constructor(tokens : Iterable<Token>) {
        this.tokens = Object.freeze(Array.from(tokens));
        Object.freeze(this);
    }

    /**
     * The source text of the sentence, reassembled from its tokens.
     */
    get text() : string {
        return this.tokens.map((tok) => tok.text).join('');
    }

    words() : Array<WordToken|ProperWordToken> {
        return this.tokens.filter(isWordToken);
    }

    toJSON() : SentenceJSON {
        return { tokens: this.tokens.map((tok) => ({ type: tok.type, text: tok.text })) };
    }
}

export class Document {
    private readonly _sentences : readonly Sentence[];

    constructor(sentences : Iterable<Sentence>) {
        this._sentences = Object.freeze(Array.from(sentences));
        Object.freeze(this);
    }

    get text() : string {
        return this._sentences.map((sentence) => sentence.text).join('');
    }

    sentences() : readonly Sentence[] {
        return this._sentences;
    }

    /**
     * All word and proper word tokens in the document, in document order.
     */
    allWords() : Array<WordToken|ProperWordToken> {
        const words : Array<WordToken|ProperWordToken> = [];
        for (const sentence of this._sentences)
            words.push(...sentence.words());
        return words;
    }

    allWordsAsText() : string[] {
        return this.allWords().map((tok) => tok.text);
    }

    toJSON() : DocumentJSON {
        return { sentences: this._sentences.map((sentence) => sentence.toJSON()) };
    }
}
