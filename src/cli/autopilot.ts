import { gameConfig } from 'config/game';
import type { LayoutPlatform, LevelLayout } from 'levels/contracts';
import type { EnemyView, PlayerInput } from 'physics/world';
import type { SkillLabel } from 'skill/labels';
import type { PlayerFrame } from 'telemetry/contracts';
import type { RandomSource } from 'util/random';

export interface AutopilotProfile {
    /** Chance per tick that a due jump is missed. */
    readonly reactionJitter: number;
    /** How far ahead of the leading edge the bot looks for ledges, gaps and walkers. */
    readonly lookAhead: number;
    /** Chance per tick of letting go of the run button. */
    readonly hesitation: number;
}

export const AUTOPILOT_PROFILES: Readonly<Record<SkillLabel, AutopilotProfile>> = {
    novice: { reactionJitter: 0.35, lookAhead: 30, hesitation: 0.2 },
    intermediate: { reactionJitter: 0.15, lookAhead: 60, hesitation: 0.08 },
    expert: { reactionJitter: 0.02, lookAhead: 90, hesitation: 0 },
};

export interface AutopilotView {
    readonly player: PlayerFrame;
    readonly layout: LevelLayout;
    readonly enemies: readonly EnemyView[];
}

export interface Autopilot {
    readonly profile: AutopilotProfile;
    readonly decide: (view: AutopilotView) => PlayerInput;
}

const supportingPlatform = (player: PlayerFrame, platforms: readonly LayoutPlatform[]): LayoutPlatform | undefined => {
    const bottom = player.bounds.y + player.bounds.height;
    const centerX = player.bounds.x + player.bounds.width / 2;
    return platforms.find(
        (platform) =>
            Math.abs(bottom - platform.y) <= gameConfig.physics.groundTolerance &&
            centerX >= platform.x &&
            centerX <= platform.x + platform.width,
    );
};

export const createAutopilot = (profile: AutopilotProfile, random: RandomSource): Autopilot => {
    const wantsJump = (view: AutopilotView): boolean => {
        const { player, layout, enemies } = view;
        if (!player.grounded) {
            return false;
        }

        const front = player.bounds.x + player.bounds.width;
        const reach = front + profile.lookAhead;
        const bottom = player.bounds.y + player.bounds.height;

        const support = supportingPlatform(player, layout.platforms);
        if (support && reach >= support.x + support.width) {
            return true;
        }

        const stepUp = layout.platforms.some(
            (platform) => platform.x > front && platform.x <= reach && platform.y < bottom - 8,
        );
        if (stepUp) {
            return true;
        }

        return enemies.some(
            (enemy) =>
                enemy.active &&
                enemy.x > front &&
                enemy.x <= reach &&
                Math.abs(enemy.y + gameConfig.levels.enemy.size - bottom) < 40,
        );
    };

    const decide: Autopilot['decide'] = (view) => {
        const jump = wantsJump(view) && random() >= profile.reactionJitter;
        const run = random() >= profile.hesitation;
        return { left: false, right: run || jump, jump };
    };

    return { profile, decide };
};
