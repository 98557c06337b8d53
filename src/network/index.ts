// Core
export * from './core';

// Simulation kernel
export { Simulator, Task, DEFAULT_RUN_TIMEOUT_PS } from './sim/Simulator';
export type { RunOptions } from './sim/Simulator';
export { SignalBus, Signal } from './sim/SignalBus';
export type { SignalState, EdgeKind } from './sim/SignalBus';
export { Clock } from './sim/Clock';
export { SimEvent } from './sim/SimEvent';

// Frames
export { Frame } from './frame/Frame';
export type { FrameBytes, FrameOptions, FromPayloadOptions } from './frame/Frame';
export { Completion } from './frame/Completion';

// Codecs
export { SubByteCodec, XgmiiCodec, BYTE_CODEC, NIBBLE_CODEC, DIBIT_CODEC } from './codec/LaneCodec';
export type { LaneCodec, FramingStyle, ReassembledBytes } from './codec/LaneCodec';
export { CountdownGap, DeficitIdleGap } from './codec/GapControl';
export type { GapControl, DeficitIdleOptions } from './codec/GapControl';

// Link engines
export { LinkTransmitter } from './link/LinkTransmitter';
export type { LinkTransmitterOptions, TransmitStats } from './link/LinkTransmitter';
export { LinkReceiver } from './link/LinkReceiver';
export type { LinkReceiverOptions, ReceiveStats } from './link/LinkReceiver';
export { FrameQueue } from './link/FrameQueue';
export { TransmitSequencer } from './link/TransmitSequencer';
export type { TxCycle, TransmitSequencerOptions } from './link/TransmitSequencer';
export { FrameAssembler } from './link/FrameAssembler';
export { ResettableEngine } from './link/ResettableEngine';
export type { ResetOptions } from './link/ResettableEngine';
export { EdgeDivider } from './link/ports/BusPort';
export type { TxPort, RxPort, PortClocking } from './link/ports/BusPort';
export type { EnvelopeSignals } from './link/ports/EnvelopePort';
export type { RgmiiSignals } from './link/ports/RgmiiPort';
export type { XgmiiSignals } from './link/ports/XgmiiPort';

// Interfaces
export { GmiiTransmitter, GmiiReceiver } from './hardware/Gmii';
export type { GmiiEngineOptions } from './hardware/Gmii';
export { MiiTransmitter, MiiReceiver } from './hardware/Mii';
export { RgmiiTransmitter, RgmiiReceiver } from './hardware/Rgmii';
export type { RgmiiEngineOptions } from './hardware/Rgmii';
export { RmiiTransmitter, RmiiReceiver } from './hardware/Rmii';
export type { RmiiEngineOptions } from './hardware/Rmii';
export { XgmiiTransmitter, XgmiiReceiver, xgmiiLanes } from './hardware/Xgmii';
export type { XgmiiTransmitterOptions, XgmiiReceiverOptions } from './hardware/Xgmii';
export type { EngineOptions, TransmitterOptions, PhyOptions } from './hardware/types';

// PHY models
export { Phy } from './hardware/Phy';
export { GmiiPhy } from './hardware/GmiiPhy';
export type { GmiiPhySignals } from './hardware/GmiiPhy';
export { MiiPhy } from './hardware/MiiPhy';
export type { MiiPhySignals } from './hardware/MiiPhy';
export { RgmiiPhy } from './hardware/RgmiiPhy';
export type { RgmiiPhySignals } from './hardware/RgmiiPhy';
export { RmiiPhy } from './hardware/RmiiPhy';
export type { RmiiPhySignals } from './hardware/RmiiPhy';
export { XgmiiPhy } from './hardware/XgmiiPhy';
export type { XgmiiPhySignals, XgmiiPhyOptions } from './hardware/XgmiiPhy';
