import type { GameConfig } from './config';

// Run score: survival time plus tornado bonuses. Never decreases during a run.
export class ScoreKeeper {
    score = 0;
    private nextMilestone: number;

    constructor(private readonly cfg: GameConfig['score'], public highScore = 0) {
        this.nextMilestone = cfg.milestone;
    }

    get displayScore(): number { return Math.floor(this.score); }
    get isNewHighScore(): boolean { return this.displayScore > this.highScore; }

    // Returns how many milestones were crossed by this step.
    addSurvival(dt: number): number {
        if (dt > 0) this.score += this.cfg.perSecond * dt;
        return this.collectMilestones();
    }

    addBonus(points: number): number {
        if (points > 0) this.score += points;
        return this.collectMilestones();
    }

    // Folds the run into the best score; true when it was beaten.
    finish(): boolean {
        const beaten = this.isNewHighScore;
        if (beaten) this.highScore = this.displayScore;
        return beaten;
    }

    private collectMilestones(): number {
        let crossed = 0;
        while (this.score >= this.nextMilestone) {
            crossed++;
            this.nextMilestone += this.cfg.milestone;
        }
        return crossed;
    }
}
