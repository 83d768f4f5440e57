// Core types - shared across all packages
export * from './types'

// Schemas for validation
export * from './schemas/config'

// Plan construction from validated config
export * from './plan'

// Case conversion utilities (PascalCase ↔ camelCase)
export * from './case-convert'
