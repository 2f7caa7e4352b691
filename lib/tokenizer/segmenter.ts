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

/**
 * Returned by {@link BoundaryIterator.next} and {@link BoundaryIterator.advanceTo}
 * once the last boundary has been passed.
 */
export const DONE = -1;

/**
 * A forward-only cursor over the boundaries of a piece of text.
 *
 * Boundaries are UTF-16 offsets into {@link BoundaryIterator.text}; two
 * consecutive boundaries delimit one segment. Cursors carry position state,
 * so every parse uses its own.
 */
export interface BoundaryIterator {
    readonly text : string;

    /**
     * Rewind to the start of the text and return the first boundary (always 0).
     */
    first() : number;

    /**
     * Move past the next segment and return the boundary at its end,
     * or {@link DONE} if there are no more segments.
     */
    next() : number;

    /**
     * Move forward to the first boundary that is greater than or equal to
     * `offset`, and return it, or {@link DONE} if there is none.
     */
    advanceTo(offset : number) : number;

    isBoundary(offset : number) : boolean;
}

export interface BoundarySegmenter {
    readonly locale : string;

    sentences(text : string) : BoundaryIterator;
    words(text : string) : BoundaryIterator;
}

class SegmentBoundaryIterator implements BoundaryIterator {
    readonly text : string;
    private readonly _segments : Intl.Segments;
    private _iterator : Iterator<Intl.SegmentData>;
    private _current : number;

    constructor(segmenter : Intl.Segmenter, text : string) {
        this.text = text;
        this._segments = segmenter.segment(text);
        this._iterator = this._segments[Symbol.iterator]();
        this._current = 0;
    }

    first() : number {
        this._iterator = this._segments[Symbol.iterator]();
        this._current = 0;
        return 0;
    }

    next() : number {
        if (this._current === DONE)
            return DONE;

        const step = this._iterator.next();
        if (step.done) {
            this._current = DONE;
            return DONE;
        }
        this._current = step.value.index + step.value.segment.length;
        return this._current;
    }

    advanceTo(offset : number) : number {
        while (this._current !== DONE && this._current < offset)
            this.next();
        return this._current;
    }

    isBoundary(offset : number) : boolean {
        if (offset < 0 || offset > this.text.length)
            return false;
        if (offset === 0 || offset === this.text.length)
            return true;

        const segment = this._segments.containing(offset);
        return segment !== undefined && segment.index === offset;
    }
}

/**
 * Unicode text segmentation (UAX #29) for a given locale, backed by
 * the ICU rules that ship with the runtime.
 */
export class IntlBoundarySegmenter implements BoundarySegmenter {
    readonly locale : string;
    private readonly _sentenceSegmenter : Intl.Segmenter;
    private readonly _wordSegmenter : Intl.Segmenter;

    constructor(locale : string) {
        this.locale = locale;
        this._sentenceSegmenter = new Intl.Segmenter(locale, { granularity: 'sentence' });
        this._wordSegmenter = new Intl.Segmenter(locale, { granularity: 'word' });
    }

    sentences(text : string) : BoundaryIterator {
        return new SegmentBoundaryIterator(this._sentenceSegmenter, text);
    }

    words(text : string) : BoundaryIterator {
        return new SegmentBoundaryIterator(this._wordSegmenter, text);
    }
}
