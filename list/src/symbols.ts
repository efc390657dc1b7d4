// Key of the node chain inside a list; not re-exported so nodes stay private to the package
export const chain = Symbol('chain');
