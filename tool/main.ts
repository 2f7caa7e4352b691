#!/usr/bin/env node
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

process.on('unhandledRejection', (up) => {
    throw up;
});

import * as argparse from 'argparse';

import * as ExtractProperNames from './extract-proper-names';
import * as Tokenize from './tokenize';

const subcommands = {
    'extract-proper-names': ExtractProperNames,
    'tokenize': Tokenize,
};

async function main() {
    const parser = new argparse.ArgumentParser({
        add_help: true,
        description: "Split text documents into sentences and tokens, recognizing multi-word proper names."
    });

    const subparsers = parser.add_subparsers({
        title: 'Available sub-commands',
        dest: 'subcommand',
        required: true
    } as argparse.SubparserOptions);
    for (const subcommand of Object.values(subcommands))
        subcommand.initArgparse(subparsers);

    const args = parser.parse_args();
    const subcommand : keyof typeof subcommands = args.subcommand;
    await subcommands[subcommand].execute(args);
}
main().catch((e) => {
    console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
    process.exitCode = 1;
});
