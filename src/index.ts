/*
 * SPDX-License-Identifier: Apache-2.0
 */

import 'reflect-metadata';
import {type Contract} from 'fabric-contract-api';
import { AccessContract } from './contracts/AccessContract';
import { TokenContract } from './contracts/TokenContract';
import { ProductContract } from './contracts/ProductContract';

export { AccessContract } from './contracts/AccessContract';
export { TokenContract } from './contracts/TokenContract';
export { ProductContract } from './contracts/ProductContract';
export { LifecycleEngine } from './lifecycle/LifecycleEngine';
export * from './errors';

export const contracts: typeof Contract[] = [
    AccessContract,
    TokenContract,
    ProductContract,
];
