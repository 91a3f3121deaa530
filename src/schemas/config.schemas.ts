import { z } from 'zod';
import { MISSING_AIRPORT_POLICIES } from '../types/flight.types';
import { SIM_CHOICES } from '../types/aircraft.types';
import { LOG_LEVELS } from '../types/config.types';

export const simChoiceSchema = z.enum(SIM_CHOICES);

export const missingAirportPolicySchema = z.enum(MISSING_AIRPORT_POLICIES);

export const envSchema = z.enum(['development', 'production', 'test']);

export const logLevelSchema = z.enum(LOG_LEVELS);
