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

export class DictionaryError extends Error {
    code : string;
    filename : string;

    constructor(filename : string, cause : unknown) {
        super(`Failed to load dictionary ${filename}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'DictionaryError';
        this.code = getErrorCode(cause) ?? 'EIO';
        this.filename = filename;
    }
}

export function getErrorCode(err : unknown) : string|undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string')
        return err.code;
    return undefined;
}
