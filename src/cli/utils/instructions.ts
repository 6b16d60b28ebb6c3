import type {BoardDefinition} from '../../boards/types.ts'

/** Files `init` writes, all with the same content */
export const INSTRUCTION_FILES = ['CLAUDE.md', '.cursorrules'] as const

/**
 * 'http_server' -> 'Http Server'
 */
export function capabilityLabel(capability: string): string {
  return capability
    .split('_')
    .filter(word => word !== '')
    .map(word => word[0].toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

function header(board: BoardDefinition, port: string): string {
  return `# Embedded Development: ${board.name}

You are developing firmware for a ${board.name} connected via USB.

## Hardware
- Board: ${board.name}
- FQBN: ${board.fqbn}
- Port: ${port}
- Framework: Arduino
- Baud rate: ${board.baudRate}`
}

function commands(board: BoardDefinition, port: string): string {
  const additionalUrls = board.corePackageUrl ? ` --additional-urls ${board.corePackageUrl}` : ''
  return `
## Commands

Install the board core (once per machine):
\`\`\`
arduino-cli core install ${board.coreId}${additionalUrls}
\`\`\`

Compile:
\`\`\`
arduino-cli compile --fqbn ${board.fqbn} .
\`\`\`

Flash:
\`\`\`
arduino-cli upload --fqbn ${board.fqbn} --port ${port} .
\`\`\``
}

function developmentLoop(board: BoardDefinition, port: string): string {
  return `
## Development Loop

Every time you change code, follow this exact sequence:

1. Edit the .ino file (or .cpp/.h files)
2. Compile: \`arduino-cli compile --fqbn ${board.fqbn} .\`
3. If compile fails, read the errors, fix them, and recompile. Do NOT flash broken code.
4. Flash: \`arduino-cli upload --fqbn ${board.fqbn} --port ${port} .\`
5. Wait 3 seconds for the board to reboot.
6. **Validate your changes** using the method below.
7. If validation fails, go back to step 1 and iterate.`
}

function validation(board: BoardDefinition, port: string): string {
  return `
## Validation

Always check that the firmware actually behaves correctly on the device after flashing.

### Read Serial Output

Capture serial output from the board with this Python snippet (requires pyserial):

\`\`\`python
import serial, time
ser = serial.Serial('${port}', ${board.baudRate}, timeout=1)
time.sleep(3)  # wait for boot
start = time.time()
while time.time() - start < 10:  # read for 10 seconds
    line = ser.readline().decode('utf-8', errors='ignore').strip()
    if line:
        print(line)
ser.close()
\`\`\`

Save it as \`read_serial.py\`, run \`python read_serial.py\`, and inspect the output.

**Serial conventions for your firmware:**
- Call \`Serial.begin(${board.baudRate})\` in setup()
- Use \`Serial.println()\` so each message is a complete line
- Print \`[READY]\` once initialization is complete
- Print \`[ERROR] <description>\` for any error condition
- Tag structured output, e.g. \`[SENSOR] temp=23.4\`, \`[STATUS] running\``
}

function boardInfo(board: BoardDefinition): string {
  const parts = [`\n## ${board.name}-Specific Information`]

  // only capabilities that need a header are worth listing
  const includes = Object.entries(board.includeDirectives)
  if (includes.length > 0) {
    parts.push('\n### Capabilities')
    for (const [capability, include] of includes) {
      parts.push(`- ${capabilityLabel(capability)}: \`${include}\``)
    }
  }

  const pins = Object.entries(board.pins)
  if (pins.length > 0) {
    parts.push('\n### Default Pins')
    for (const [pin, number] of pins) {
      parts.push(`- ${pin}: ${number}`)
    }
  }

  if (board.pinNotes.length > 0) {
    parts.push('\n### Pin Reference')
    for (const note of board.pinNotes) {
      parts.push(`- ${note}`)
    }
  }

  if (board.pitfalls.length > 0) {
    parts.push('\n### Common Pitfalls')
    for (const pitfall of board.pitfalls) {
      parts.push(`- ${pitfall}`)
    }
  }

  return parts.join('\n')
}

/**
 * Render the assistant instructions document for a board on a serial port.
 */
export function renderInstructions(board: BoardDefinition, port: string): string {
  return [
    header(board, port),
    commands(board, port),
    developmentLoop(board, port),
    validation(board, port),
    boardInfo(board),
  ].join('\n') + '\n'
}
