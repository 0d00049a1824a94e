/**
 * litval CLI - decode literal lexemes from the command line
 */

import { Command } from 'commander'
import { decodeCommand } from './decode'

const program = new Command()

program.name('litval').description('Decode the values of literal tokens').version('0.1.0')

// Register commands
program.addCommand(decodeCommand)

// Parse arguments
program.parse()
