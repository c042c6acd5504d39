/*!
 * Copyright (c) Microsoft Corporation and contributors. All rights reserved.
 * Licensed under the MIT License.
 */

import registerDebug from "debug";

export const debugNamespace = "reaction-paginator";

export const debug = registerDebug(`${debugNamespace}:paginator`);
export const debugIndex = registerDebug(`${debugNamespace}:index`);
