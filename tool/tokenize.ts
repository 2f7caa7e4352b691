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

import * as argparse from 'argparse';

import { TokenizerArgs, addTokenizerArguments, parseInput } from './lib/argutils';

export function initArgparse(subparsers : argparse.SubParser) {
    const parser = subparsers.add_parser('tokenize', {
        add_help: true,
        description: "Split a text document into sentences and tokens, and print the result as JSON."
    });
    addTokenizerArguments(parser);
}

export async function execute(args : TokenizerArgs) {
    const doc = await parseInput(args);
    console.log(JSON.stringify(doc, undefined, 2));
}
