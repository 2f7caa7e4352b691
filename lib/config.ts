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

import * as path from 'path';

/**
 * The locale used for segmentation when none is given explicitly.
 */
export const DEFAULT_LOCALE = 'en-US';

/**
 * The bundled proper name dictionary, one name per line.
 */
export const BUNDLED_DICTIONARY_PATH = path.resolve(__dirname, '../data/proper-names.txt');

/**
 * The dictionary loaded when a tokenizer is constructed without one.
 * Can be overridden with the PROPER_NAMES_DICTIONARY environment variable.
 */
export const DEFAULT_DICTIONARY_PATH = process.env.PROPER_NAMES_DICTIONARY || BUNDLED_DICTIONARY_PATH;
