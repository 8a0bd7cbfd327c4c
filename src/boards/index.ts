export * from './board.js'
export * from './boardgroup.js'
export * from './motorBoard.js'
export * from './servoBoard.js'
export * from './powerBoard.js'
export * from './ruggeduino.js'
