export enum LoopState {
    Idle = "idle",
    Starting = "starting",
    Running = "running",
    ShuttingDown = "shutting_down",
    Stopped = "stopped"
}
