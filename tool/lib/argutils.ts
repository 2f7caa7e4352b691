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

import * as fs from 'fs';
import * as stream from 'stream';
import * as argparse from 'argparse';
import * as log4js from 'log4js';

import { DEFAULT_LOCALE } from '../../lib/config';
import ProperNameTokenizer from '../../lib/tokenizer/proper-name-tokenizer';
import { loadDictionaryFile } from '../../lib/tokenizer/dictionary';
import { Document } from '../../lib/tokenizer/tokens';

export interface TokenizerArgs {
    input : string;
    dictionary : string|undefined;
    locale : string;
    debug : boolean;
}

export function maybeCreateReadStream(filename : string) : stream.Readable {
    if (filename === '-')
        return process.stdin;
    else
        return fs.createReadStream(filename);
}

export async function readAllText(input : stream.Readable) : Promise<string> {
    let text = '';
    for await (const chunk of input.setEncoding('utf8'))
        text += chunk;
    return text;
}

export function addTokenizerArguments(parser : argparse.ArgumentParser) : void {
    parser.add_argument('input', {
        help: 'Path to the text document to tokenize (use - for standard input)'
    });
    parser.add_argument('-d', '--dictionary', {
        required: false,
        help: 'Path to a proper name dictionary, one name per line (defaults to the bundled dictionary)'
    });
    parser.add_argument('-l', '--locale', {
        required: false,
        default: DEFAULT_LOCALE,
        help: `BCP 47 locale tag used for sentence and word segmentation (defaults to '${DEFAULT_LOCALE}')`
    });
    parser.add_argument('--debug', {
        action: 'store_true',
        default: false,
        help: 'Enable debug logging'
    });
}

// results go to stdout, so logs go to stderr
export function configureLogging(debug : boolean) : void {
    log4js.configure({
        appenders: {
            stderr: { type: 'stderr' },
        },
        categories: {
            default: { appenders: ['stderr'], level: debug ? 'debug' : 'warn' },
        },
    });
}

export async function createTokenizer(args : TokenizerArgs) : Promise<ProperNameTokenizer> {
    const options = { locale: args.locale };
    if (args.dictionary)
        return new ProperNameTokenizer(await loadDictionaryFile(args.dictionary), options);
    else
        return new ProperNameTokenizer(undefined, options);
}

export async function parseInput(args : TokenizerArgs) : Promise<Document> {
    configureLogging(args.debug);

    const tokenizer = await createTokenizer(args);
    const logger = log4js.getLogger('cli');
    logger.debug(`loaded ${tokenizer.dictionary.size} proper names`);

    const text = await readAllText(maybeCreateReadStream(args.input));
    return tokenizer.parseDocument(text);
}
