import { EnumType, variableFactory } from '../engine'
import type { NlParameters } from './types'

/** Typed `VariableSpec` builder bound to the Dutch parameter tree. */
export const defineVariable = variableFactory<NlParameters>()

export const HousingOccupancyStatus = new EnumType(
  'HousingOccupancyStatus',
  ['owner', 'tenant', 'free_lodger', 'homeless'],
  'tenant',
  {
    owner: 'Owner',
    tenant: 'Tenant',
    free_lodger: 'Free lodger',
    homeless: 'Homeless',
  },
)
