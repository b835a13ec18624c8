import type { z } from 'zod';
import type { configurationSchema } from '../services/configuration/configuration.schema';

type DeepReadonly<T> = { readonly [K in keyof T]: T[K] extends object ? DeepReadonly<T[K]> : T[K] };

export type TradingConfiguration = DeepReadonly<z.output<typeof configurationSchema>>;
export type PersistenceConfiguration = TradingConfiguration['persistence'];
