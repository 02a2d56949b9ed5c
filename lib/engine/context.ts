let nextId = 0;

// Sequential so spawns only draw from Math.random for their own fields
export const generateId = (prefix = 'id') => `${prefix}-${nextId++}`;
