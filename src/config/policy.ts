import type { ConfirmPolicy } from '../types/config.js'
import { allowAll, createTerminalGate, denyAll, type ConfirmationGate } from '../store/gate.js'

/** Map the configured confirm policy to a confirmation gate. */
export function gateForPolicy(policy: ConfirmPolicy): ConfirmationGate {
  switch (policy) {
    case 'always':
      return allowAll
    case 'never':
      return denyAll
    case 'prompt':
      return createTerminalGate()
  }
}
