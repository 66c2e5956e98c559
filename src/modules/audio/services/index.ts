export { AudioFrameBuffer } from './audio-frame-buffer.service';
export { MicrophoneService } from './microphone.service';
