/**
 * Public surface of the math package. Pure, side-effect free helpers.
 */
export * from './threshold'
export * from './fee'
export * from './priority'
