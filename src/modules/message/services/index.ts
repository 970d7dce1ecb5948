export { MessageService } from './message.service';
