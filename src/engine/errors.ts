/**
 * Engine errors — every definitional or data error the evaluator raises.
 *
 * All of them abort the run. Callers that need to tell them apart switch on
 * `code` (the web API forwards it verbatim) or use `instanceof`.
 */

export type EngineErrorCode =
  | 'unknown_variable'
  | 'duplicate_variable'
  | 'period_mismatch'
  | 'cyclic_dependency'
  | 'invalid_scale'
  | 'invalid_period'
  | 'unknown_symbol'
  | 'value_type_mismatch'
  | 'entity_mismatch'
  | 'invalid_input'
  | 'unknown_parameter'
  | 'registry_frozen'

export class EngineError extends Error {
  readonly code: EngineErrorCode

  constructor(code: EngineErrorCode, message: string) {
    super(message)
    this.name = 'EngineError'
    this.code = code
  }
}

export class UnknownVariableError extends EngineError {
  readonly variable: string

  constructor(variable: string) {
    super('unknown_variable', `Variable "${variable}" is not registered`)
    this.name = 'UnknownVariableError'
    this.variable = variable
  }
}

export class DuplicateVariableError extends EngineError {
  readonly variable: string

  constructor(variable: string) {
    super('duplicate_variable', `Variable "${variable}" is already registered`)
    this.name = 'DuplicateVariableError'
    this.variable = variable
  }
}

export class PeriodMismatchError extends EngineError {
  constructor(message: string) {
    super('period_mismatch', message)
    this.name = 'PeriodMismatchError'
  }
}

export class CyclicDependencyError extends EngineError {
  /** Keys of the form `name@period`, first element repeated at the end. */
  readonly cycle: string[]

  constructor(cycle: string[]) {
    super('cyclic_dependency', `Cyclic dependency: ${cycle.join(' -> ')}`)
    this.name = 'CyclicDependencyError'
    this.cycle = cycle
  }
}

export class InvalidScaleError extends EngineError {
  constructor(message: string) {
    super('invalid_scale', message)
    this.name = 'InvalidScaleError'
  }
}

export class InvalidPeriodError extends EngineError {
  constructor(message: string) {
    super('invalid_period', message)
    this.name = 'InvalidPeriodError'
  }
}

export class UnknownSymbolError extends EngineError {
  readonly symbol: string

  constructor(enumName: string, symbol: string, allowed: readonly string[]) {
    super(
      'unknown_symbol',
      `"${symbol}" is not a value of ${enumName} (expected one of: ${allowed.join(', ')})`,
    )
    this.name = 'UnknownSymbolError'
    this.symbol = symbol
  }
}

export class ValueTypeMismatchError extends EngineError {
  constructor(message: string) {
    super('value_type_mismatch', message)
    this.name = 'ValueTypeMismatchError'
  }
}

export class EntityMismatchError extends EngineError {
  constructor(message: string) {
    super('entity_mismatch', message)
    this.name = 'EntityMismatchError'
  }
}

export class InvalidInputError extends EngineError {
  constructor(message: string) {
    super('invalid_input', message)
    this.name = 'InvalidInputError'
  }
}

export class UnknownParameterError extends EngineError {
  constructor(message: string) {
    super('unknown_parameter', message)
    this.name = 'UnknownParameterError'
  }
}

export class RegistryFrozenError extends EngineError {
  constructor(variable: string) {
    super(
      'registry_frozen',
      `Cannot register "${variable}": the registry is frozen once a simulation uses it`,
    )
    this.name = 'RegistryFrozenError'
  }
}
