export * from './pam'
export * from './pnm'
