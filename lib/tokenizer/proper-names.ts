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
 * Compute the dictionary key of a proper name: its first word.
 */
export function keyOf(name : string) : string {
    const idx = name.indexOf(' ');
    if (idx === -1)
        return name;
    return name.substring(0, idx).trim();
}

/**
 * The proper name dictionary.
 *
 * Names are indexed by their first word. Under each key, candidates are kept
 * longest first, so the first candidate that matches is the longest match.
 * Names of the same length keep the order in which they were added.
 */
export default class ProperNameDictionary {
    private readonly _storage : Map<string, string[]>;
    private readonly _names : Set<string>;

    constructor(names : Iterable<string> = []) {
        this._storage = new Map;
        this._names = new Set;

        for (const name of names)
            this._add(name.trim());

        // Array.prototype.sort is stable, so ties stay in insertion order
        for (const candidates of this._storage.values())
            candidates.sort((a, b) => b.length - a.length);
    }

    private _add(name : string) {
        if (!name || this._names.has(name))
            return;
        this._names.add(name);

        const key = keyOf(name);
        let candidates = this._storage.get(key);
        if (!candidates) {
            candidates = [];
            this._storage.set(key, candidates);
        }
        candidates.push(name);
    }

    get size() : number {
        return this._names.size;
    }

    has(key : string) : boolean {
        return this._storage.has(key);
    }

    keys() : Iterable<string> {
        return this._storage.keys();
    }

    candidatesForKey(key : string) : readonly string[] {
        return this._storage.get(key) || [];
    }

    [Symbol.iterator]() : Iterator<string> {
        return this._names[Symbol.iterator]();
    }
}
