import logger from '../utils/logger';
import { PHASE_DESCRIPTIONS, PHASE_TOOLS, WorkflowPhase } from './WorkflowPhase';

/**
 * Hands out the capability set for the current phase. Sessions take the
 * returned set in their constructor; nothing shared is reconfigured.
 */
export class PhaseManager {
    private phase: WorkflowPhase = 'FULL';
    private transitions = 0;

    /**
     * @param registered every tool name the registry knows
     * @param switching when off, the manager stays in FULL
     */
    constructor(private readonly registered: readonly string[], private readonly switching: boolean = true) {}

    switchToPhase(phase: WorkflowPhase): ReadonlySet<string> {
        if (!this.switching) {
            return this.capabilities();
        }
        if (phase !== this.phase) {
            logger.info(`🔄 Phase ${this.phase} -> ${phase}: ${PHASE_DESCRIPTIONS[phase]}`);
            this.phase = phase;
            this.transitions++;
        }
        return this.capabilities();
    }

    capabilities(): ReadonlySet<string> {
        if (!this.switching || this.phase === 'FULL') {
            return new Set(this.registered);
        }
        const registered = new Set(this.registered);
        return new Set(PHASE_TOOLS[this.phase].filter(name => registered.has(name)));
    }

    currentPhase(): WorkflowPhase {
        return this.switching ? this.phase : 'FULL';
    }

    isSwitchingEnabled(): boolean {
        return this.switching;
    }

    transitionCount(): number {
        return this.transitions;
    }
}
